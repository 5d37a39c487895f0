import type {
  LayoutConfig,
  SectionPlacement,
  TableBlock,
  TableCell,
  TableGrid,
  TableLayout,
} from '@slidegrid/contracts';
import { layoutSectionBase, SECTION_HEADER_HEIGHT_MM } from './section-header.js';

/** Horizontal inset of the table grid inside its placement, per side. */
export const TABLE_INSET_MM = 2;

/**
 * Forces every row to exactly `columnCount` cells: short rows are padded with
 * empty strings, long rows are cut.
 */
export function normalizeTableRows(rows: string[][], columnCount: number): string[][] {
  return rows.map((row) =>
    Array.from({ length: columnCount }, (_, index) => (index < row.length ? row[index] : '')),
  );
}

/**
 * Lays out a table as a fixed grid below the section header.
 *
 * Column widths are equal. The grid height is `(rows + 1) * rowHeight` and is
 * not limited to the placement: a large table overflows its estimate.
 *
 * @example
 * ```typescript
 * // 3 columns, 4 body rows, 190mm placement, default 8mm rows
 * // -> columnWidth (190 - 4) / 3 = 62, height 5 * 8 = 40
 * ```
 */
export function layoutTableSection(block: TableBlock, placement: SectionPlacement, config: LayoutConfig): TableLayout {
  const { columns } = block.content;
  const rows = normalizeTableRows(block.content.rows, columns.length);
  const rowHeight = config.components.table.rowHeightMm;

  const x = placement.x + TABLE_INSET_MM;
  const y = placement.y + SECTION_HEADER_HEIGHT_MM;
  const width = placement.width - TABLE_INSET_MM * 2;
  const columnWidth = width / Math.max(1, columns.length);

  const cells: TableCell[] = [];
  [columns, ...rows].forEach((cellsInRow, rowIndex) => {
    cellsInRow.forEach((text, columnIndex) => {
      cells.push({
        text,
        row: rowIndex,
        column: columnIndex,
        isHeader: rowIndex === 0,
        x: x + columnIndex * columnWidth,
        y: y + rowIndex * rowHeight,
        width: columnWidth,
        height: rowHeight,
      });
    });
  });

  const table: TableGrid = {
    x,
    y,
    width,
    height: (rows.length + 1) * rowHeight,
    columns: [...columns],
    rows,
    columnWidth,
    rowHeight,
    cells,
    headerFontSizePt: config.typography.tableHeaderPt,
    bodyFontSizePt: config.typography.tableBodyPt,
  };

  return { kind: 'table', ...layoutSectionBase(block, placement, config), table };
}
