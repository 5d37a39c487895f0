import {
  createConsoleDiagnosticSink,
  type DiagnosticSink,
  type LayoutConfigOverrides,
  type SectionLayout,
  type SectionPlacement,
  type SlideLayout,
  type TemplateResolver,
} from '@slidegrid/contracts';
import { applyContentLimits, normalizeContentDescription, type ContentLimits } from '@slidegrid/content-adapter';
import { createFileTemplateResolver } from '@slidegrid/templates';
import { resolveLayoutConfig } from './config.js';
import { layoutLog } from './debug.js';
import { distributeSections } from './distribute.js';
import { computeGeometry } from './geometry.js';
import { layoutFooter, layoutHeader } from './layout-page.js';
import { composeSection } from './layout-section.js';

export type LayoutSlideOptions = {
  /** Partial configuration merged onto the defaults. */
  config?: LayoutConfigOverrides;
  /** Source of slot templates. Defaults to the bundled JSON templates. */
  templates?: TemplateResolver;
  /** Receives every recoverable anomaly. Defaults to console output. */
  onDiagnostic?: DiagnosticSink;
  /**
   * Trims long content before layout. `true` applies the default limits; an
   * object overrides some of them. Off unless set.
   */
  limits?: boolean | Partial<ContentLimits>;
};

/**
 * Turns a content description into a fully positioned single-page layout.
 *
 * The input is normalised first, so any shape is accepted. Blocks are placed
 * into the declared template's slots when that template resolves, and by
 * automatic column flow otherwise. `sectionLayouts` holds one entry per block
 * in input order.
 *
 * @throws LayoutContractError when the configuration is invalid or leaves no
 * room for content
 *
 * @example
 * ```typescript
 * const layout = layoutSlide({
 *   title: 'Quarterly review',
 *   template_id: 'T1',
 *   sections: [{ id: 'current_state', type: 'bullets', header: 'Now', content: { items: ['a', 'b'] } }],
 * });
 * layout.sectionLayouts[0].kind; // 'bullets'
 * ```
 */
export function layoutSlide(input: unknown, options: LayoutSlideOptions = {}): SlideLayout {
  const report = options.onDiagnostic ?? createConsoleDiagnosticSink('layoutSlide');

  let content = normalizeContentDescription(input);
  if (options.limits) {
    content = applyContentLimits(content, options.limits === true ? {} : options.limits, report);
  }

  const config = resolveLayoutConfig(options.config);
  const geometry = computeGeometry(config);

  const resolver = options.templates ?? createFileTemplateResolver({ onDiagnostic: report });
  const template = resolver.resolve(content.templateId);
  if (!template) {
    const declared = content.templateId !== null;
    report({
      code: 'template-fallback',
      level: declared ? 'warn' : 'info',
      message: declared
        ? `Template ${content.templateId} is not available; using automatic layout`
        : 'No template declared; using automatic layout',
      details: { templateId: content.templateId },
    });
  }

  const placements = distributeSections(content.sections, geometry, { template, onDiagnostic: report });
  const byBlock = new Map<number, SectionPlacement>(placements.map((placement) => [placement.blockIndex, placement]));

  const sectionLayouts: SectionLayout[] = [];
  content.sections.forEach((block, index) => {
    const placement = byBlock.get(index);
    if (!placement) {
      throw new Error(`layoutSlide: block ${index} was not placed`);
    }
    sectionLayouts.push(composeSection(block, placement, config));
  });

  layoutLog(
    `[layoutSlide] ${sectionLayouts.length} sections, flow=${template ? 'template' : 'automatic'}, template=${content.templateId ?? 'none'}`,
  );

  return {
    templateId: content.templateId,
    flow: template ? 'template' : 'automatic',
    pageSize: { ...geometry.pageSize },
    theme: {
      fontFamily: config.typography.fontFamily,
      backgroundColor: config.page.backgroundColor,
      colors: { ...config.colors },
    },
    headerLayout: layoutHeader(content.title, content.subtitle, geometry, config),
    sectionLayouts,
    footerLayout: layoutFooter(content.footerNote, geometry, config),
  };
}

export { resolveLayoutConfig, DEFAULT_LAYOUT_CONFIG } from './config.js';
export { computeGeometry } from './geometry.js';
export { estimateSectionHeight, estimateTextHeight, HEADER_ALLOWANCE_MM } from './estimate.js';
export { distributeSections, clampColumnHint, clampToSlot, type DistributeOptions } from './distribute.js';
export { createColumnFlow, type ColumnFlow, type PlacementRequest } from './column-flow.js';
export { composeSection } from './layout-section.js';
export { layoutBulletsSection } from './layout-bullets.js';
export { layoutTableSection, normalizeTableRows, TABLE_INSET_MM } from './layout-table.js';
export { layoutFlowchartSection, connectSteps } from './layout-flowchart.js';
export { layoutKpiSection, kpiCaption } from './layout-kpi.js';
export { layoutTextSection } from './layout-text.js';
export { layoutHeader, layoutFooter } from './layout-page.js';
export { layoutSectionBase, SECTION_HEADER_HEIGHT_MM } from './section-header.js';
export { LayoutContractError, type LayoutContractErrorCode } from './errors.js';
