import type { ContentBlock, LayoutConfig, SectionLayoutBase, SectionPlacement } from '@slidegrid/contracts';

/** Height of the labeled bar at the top of every section, whatever its kind. */
export const SECTION_HEADER_HEIGHT_MM = 10;

/** Fields every composed section shares: identity, column, rectangle and header bar. */
export function layoutSectionBase(
  block: ContentBlock,
  placement: SectionPlacement,
  config: LayoutConfig,
): SectionLayoutBase {
  const { x, y, width, height } = placement;
  return {
    sectionId: placement.sectionId,
    column: placement.column,
    placement: { x, y, width, height },
    header: {
      text: block.header,
      x,
      y,
      width,
      height: SECTION_HEADER_HEIGHT_MM,
      fontSizePt: config.typography.sectionHeaderPt,
    },
  };
}
