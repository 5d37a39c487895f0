import type { LayoutConfig, SectionPlacement, TextBlock, TextBlockLayout } from '@slidegrid/contracts';
import { layoutSectionBase, SECTION_HEADER_HEIGHT_MM } from './section-header.js';

const BODY_INSET_MM = 2;

/**
 * Free text gets one body box below the header. The font size is left to the
 * renderer's fitter, bounded by the body size and the auto-shrink floor.
 */
export function layoutTextSection(block: TextBlock, placement: SectionPlacement, config: LayoutConfig): TextBlockLayout {
  return {
    kind: 'text_block',
    ...layoutSectionBase(block, placement, config),
    body: {
      text: block.content.text,
      x: placement.x + BODY_INSET_MM,
      y: placement.y + SECTION_HEADER_HEIGHT_MM,
      width: placement.width - BODY_INSET_MM * 2,
      height: Math.max(0, placement.height - SECTION_HEADER_HEIGHT_MM - BODY_INSET_MM),
      startFontSizePt: config.typography.bodyPt,
      minFontSizePt: config.autoShrink.minFontPt,
    },
  };
}
