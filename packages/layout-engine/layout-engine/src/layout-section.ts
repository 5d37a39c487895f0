import type { ContentBlock, LayoutConfig, SectionLayout, SectionPlacement } from '@slidegrid/contracts';
import { layoutBulletsSection } from './layout-bullets.js';
import { layoutFlowchartSection } from './layout-flowchart.js';
import { layoutKpiSection } from './layout-kpi.js';
import { layoutTableSection } from './layout-table.js';
import { layoutTextSection } from './layout-text.js';

/**
 * Produces the detailed sub-layout of one placed block. Each block type has
 * its own composer; anything else is composed as free text.
 */
export function composeSection(block: ContentBlock, placement: SectionPlacement, config: LayoutConfig): SectionLayout {
  switch (block.type) {
    case 'bullets':
      return layoutBulletsSection(block, placement, config);
    case 'table':
      return layoutTableSection(block, placement, config);
    case 'flowchart':
      return layoutFlowchartSection(block, placement, config);
    case 'kpi_box':
      return layoutKpiSection(block, placement, config);
    case 'text_block':
    default:
      return layoutTextSection(block, placement, config);
  }
}
