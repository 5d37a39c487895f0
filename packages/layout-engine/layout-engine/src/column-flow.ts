import type { PageGeometry, PlacementSource, SectionPlacement } from '@slidegrid/contracts';

export type PlacementRequest = {
  blockIndex: number;
  sectionId: string;
  /** Must already be a valid column index for the geometry. */
  column: number;
  height: number;
  source: PlacementSource;
  slotId?: string;
};

export type ColumnFlow = {
  readonly placements: SectionPlacement[];
  place(request: PlacementRequest): SectionPlacement;
  columnX(columnIndex: number): number;
  cursorY(columnIndex: number): number;
};

/**
 * Creates the per-column cursor state shared by automatic and
 * template-guided placement.
 *
 * Every column starts at the top of the body area. Each placement is stacked
 * at its column's cursor, which then advances by the placed height plus the
 * section gap, so placements within a column never overlap.
 */
export function createColumnFlow(geometry: PageGeometry): ColumnFlow {
  const cursors = geometry.columns.map((column) => column.y);
  const placements: SectionPlacement[] = [];

  const columnX = (columnIndex: number): number => geometry.columns[columnIndex].x;

  const cursorY = (columnIndex: number): number => cursors[columnIndex];

  const place = (request: PlacementRequest): SectionPlacement => {
    if (!Number.isInteger(request.column) || request.column < 0 || request.column >= geometry.columnCount) {
      throw new RangeError(`createColumnFlow: column ${request.column} is outside [0, ${geometry.columnCount})`);
    }

    const placement: SectionPlacement = {
      sectionId: request.sectionId,
      blockIndex: request.blockIndex,
      column: request.column,
      x: columnX(request.column),
      y: cursors[request.column],
      width: geometry.columnWidth,
      height: request.height,
      source: request.source,
    };
    if (request.slotId !== undefined) placement.slotId = request.slotId;

    placements.push(placement);
    cursors[request.column] += request.height + geometry.sectionGap;
    return placement;
  };

  return { placements, place, columnX, cursorY };
}
