import type { ContentBlock } from '@slidegrid/contracts';

/** Allowance for the section header row, included in every estimate. */
export const HEADER_ALLOWANCE_MM = 10;

/** Bottom padding below the body of a section. */
const PADDING_MM = 5;

/** Height of one bullet line or one table row. */
const LINE_MM = 8;

/** Fixed band a horizontal flowchart occupies, whatever its step count. */
const HORIZONTAL_FLOW_BAND_MM = 40;

const VERTICAL_STEP_MM = 25;

const KPI_BODY_MM = 35;

const TEXT_CHARS_PER_LINE = 40;

const TEXT_LINE_MM = 6;

/**
 * Estimated height of a text block body. At least one line is always
 * reserved, so empty text still gets a minimal section.
 */
export function estimateTextHeight(text: string): number {
  const lines = Math.max(1, Math.ceil(Array.from(text).length / TEXT_CHARS_PER_LINE));
  return HEADER_ALLOWANCE_MM + lines * TEXT_LINE_MM + PADDING_MM;
}

/**
 * Predicts the vertical space a block will need, in millimetres.
 *
 * This is a fixed heuristic, not text measurement. It can be off in either
 * direction; the resulting visual overflow is accepted, never raised.
 *
 * Horizontal flowcharts get a constant band while vertical ones grow with
 * their step count.
 */
export function estimateSectionHeight(block: ContentBlock): number {
  switch (block.type) {
    case 'bullets':
      return HEADER_ALLOWANCE_MM + block.content.items.length * LINE_MM + PADDING_MM;
    case 'table':
      return HEADER_ALLOWANCE_MM + (block.content.rows.length + 1) * LINE_MM + PADDING_MM;
    case 'flowchart':
      if (block.content.direction === 'v') {
        return HEADER_ALLOWANCE_MM + block.content.steps.length * VERTICAL_STEP_MM + PADDING_MM;
      }
      return HEADER_ALLOWANCE_MM + HORIZONTAL_FLOW_BAND_MM;
    case 'kpi_box':
      return HEADER_ALLOWANCE_MM + KPI_BODY_MM;
    case 'text_block':
    default:
      return estimateTextHeight(block.content.text);
  }
}
