import type { KpiBlock, KpiLayout, LayoutConfig, SectionPlacement, TextBox } from '@slidegrid/contracts';
import { layoutSectionBase } from './section-header.js';

const VALUE_INSET_MM = 5;
const VALUE_TOP_OFFSET_MM = 12;
const VALUE_HEIGHT_MM = 20;
const CAPTION_OFFSET_MM = 22;
const CAPTION_HEIGHT_MM = 10;
/** Horizontal margin of the accent frame around the value box, per side. */
const FRAME_PAD_X_MM = 5;
const FRAME_PAD_TOP_MM = 2;
/** Extra frame height below the value box, enough to enclose the caption. */
const FRAME_EXTRA_HEIGHT_MM = 15;

/** Caption line under a KPI value: unit and label joined, blank parts dropped. */
export const kpiCaption = (unit: string, label: string): string => `${unit} ${label}`.trim();

/**
 * A large centred value with a smaller caption beneath it, both inside an
 * accent frame that extends a few millimetres past the value box.
 */
export function layoutKpiSection(block: KpiBlock, placement: SectionPlacement, config: LayoutConfig): KpiLayout {
  const { value: text, unit, label } = block.content;

  const value: TextBox = {
    text,
    x: placement.x + VALUE_INSET_MM,
    y: placement.y + VALUE_TOP_OFFSET_MM,
    width: placement.width - VALUE_INSET_MM * 2,
    height: VALUE_HEIGHT_MM,
    fontSizePt: config.typography.kpiValuePt,
    bold: true,
    color: config.colors.primary,
    align: 'center',
  };

  const caption: TextBox = {
    text: kpiCaption(unit, label),
    x: value.x,
    y: value.y + CAPTION_OFFSET_MM,
    width: value.width,
    height: CAPTION_HEIGHT_MM,
    fontSizePt: config.typography.kpiCaptionPt,
    bold: false,
    color: config.colors.secondary,
    align: 'center',
  };

  const frame = {
    x: value.x - FRAME_PAD_X_MM,
    y: value.y - FRAME_PAD_TOP_MM,
    width: value.width + FRAME_PAD_X_MM * 2,
    height: value.height + FRAME_EXTRA_HEIGHT_MM,
  };

  return {
    kind: 'kpi_box',
    ...layoutSectionBase(block, placement, config),
    frame,
    value,
    caption,
    unit,
    label,
  };
}
