import type { BulletLine, BulletsBlock, BulletsLayout, LayoutConfig, SectionPlacement } from '@slidegrid/contracts';
import { layoutSectionBase, SECTION_HEADER_HEIGHT_MM } from './section-header.js';

/** Vertical space left between consecutive bullet lines. */
const LINE_GAP_MM = 1;

/**
 * One line rectangle per item at a fixed line height, starting below the
 * header bar and inset by the bullet indent on both sides. The item's indent
 * level is recorded for the renderer's hanging-indent styling; it does not
 * move the rectangle.
 */
export function layoutBulletsSection(
  block: BulletsBlock,
  placement: SectionPlacement,
  config: LayoutConfig,
): BulletsLayout {
  const { marker, indentMm, lineHeightMm } = config.components.bullets;

  const items: BulletLine[] = block.content.items.map((item, index) => ({
    text: item.text,
    marker,
    indentLevel: item.indent,
    x: placement.x + indentMm,
    y: placement.y + SECTION_HEADER_HEIGHT_MM + index * lineHeightMm,
    width: placement.width - indentMm * 2,
    height: lineHeightMm - LINE_GAP_MM,
  }));

  return { kind: 'bullets', ...layoutSectionBase(block, placement, config), items };
}
