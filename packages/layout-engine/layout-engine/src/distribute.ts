import {
  createConsoleDiagnosticSink,
  type ContentBlock,
  type DiagnosticSink,
  type PageGeometry,
  type SectionPlacement,
  type SlideTemplate,
  type TemplateSlot,
} from '@slidegrid/contracts';
import { createColumnFlow, type ColumnFlow } from './column-flow.js';
import { estimateSectionHeight } from './estimate.js';
import { layoutLog } from './debug.js';

export type DistributeOptions = {
  /** When present and non-empty, slots guide placement before automatic flow. */
  template?: SlideTemplate;
  onDiagnostic?: DiagnosticSink;
};

const isColumnInRange = (column: number, columnCount: number): boolean =>
  Number.isInteger(column) && column >= 0 && column < columnCount;

/**
 * Coerces a block's column hint into `[0, columnCount)`.
 * Missing and out-of-range hints both become column 0.
 */
export function clampColumnHint(hint: number | null, columnCount: number): number {
  return hint !== null && isColumnInRange(hint, columnCount) ? hint : 0;
}

/** Height of a slot-matched block: the estimate bounded by the slot's declared range. */
export const clampToSlot = (estimate: number, slot: TemplateSlot): number =>
  Math.max(slot.minHeightMm, Math.min(estimate, slot.maxHeightMm));

const sectionIdFor = (block: ContentBlock, index: number): string => block.id ?? `section-${index}`;

/**
 * Places one block by the automatic rule: own column hint (clamped),
 * unclamped height estimate, stacked at that column's cursor.
 */
function placeByFlow(
  flow: ColumnFlow,
  block: ContentBlock,
  index: number,
  geometry: PageGeometry,
  report: DiagnosticSink,
): SectionPlacement {
  const column = clampColumnHint(block.column, geometry.columnCount);
  if (block.column !== column) {
    const missing = block.column === null;
    report({
      code: 'column-clamped',
      level: missing ? 'info' : 'warn',
      message: missing
        ? `Section ${sectionIdFor(block, index)} has no column hint; defaulting to 0`
        : `Invalid column index ${block.column} for section ${sectionIdFor(block, index)}; defaulting to 0`,
      details: { index, sectionId: block.id, hint: block.column, columnCount: geometry.columnCount },
    });
  }

  return flow.place({
    blockIndex: index,
    sectionId: sectionIdFor(block, index),
    column,
    height: estimateSectionHeight(block),
    source: 'flow',
  });
}

/**
 * Template-free placement: blocks in input order, each stacked at the cursor
 * of its own (clamped) column.
 */
function distributeByFlow(
  blocks: ContentBlock[],
  geometry: PageGeometry,
  report: DiagnosticSink,
): SectionPlacement[] {
  const flow = createColumnFlow(geometry);
  blocks.forEach((block, index) => placeByFlow(flow, block, index, geometry, report));
  return flow.placements;
}

/**
 * Template-guided placement.
 *
 * Slots are visited in order. Each takes the first unused block whose id
 * equals the slot id, otherwise the first unused block whose column hint
 * (slot column when missing, 0 when out of range) equals the slot column.
 * A matched block goes in the slot's column with its estimate clamped to the
 * slot's height range. Unmatched slots leave nothing behind. Blocks no slot
 * claimed are then appended by the automatic rule, in input order.
 */
function distributeWithTemplate(
  blocks: ContentBlock[],
  template: SlideTemplate,
  geometry: PageGeometry,
  report: DiagnosticSink,
): SectionPlacement[] {
  const flow = createColumnFlow(geometry);
  const used = new Set<number>();

  const firstUnused = (predicate: (block: ContentBlock) => boolean): number =>
    blocks.findIndex((block, index) => !used.has(index) && predicate(block));

  for (const slot of template.slots) {
    let slotColumn = slot.column;
    if (!isColumnInRange(slotColumn, geometry.columnCount)) {
      report({
        code: 'slot-column-clamped',
        level: 'warn',
        message: `Template ${template.id} slot ${slot.id} declares column ${slot.column}; defaulting to 0`,
        details: { templateId: template.id, slotId: slot.id, column: slot.column, columnCount: geometry.columnCount },
      });
      slotColumn = 0;
    }

    let matchIndex = firstUnused((block) => block.id !== null && block.id === slot.id);
    if (matchIndex < 0) {
      matchIndex = firstUnused((block) => {
        const hint = block.column ?? slotColumn;
        return clampColumnHint(hint, geometry.columnCount) === slotColumn;
      });
    }

    if (matchIndex < 0) {
      layoutLog(`[distributeSections] slot ${slot.id} left empty`);
      continue;
    }

    used.add(matchIndex);
    const block = blocks[matchIndex];
    flow.place({
      blockIndex: matchIndex,
      sectionId: sectionIdFor(block, matchIndex),
      column: slotColumn,
      height: clampToSlot(estimateSectionHeight(block), slot),
      source: 'slot',
      slotId: slot.id,
    });
  }

  blocks.forEach((block, index) => {
    if (!used.has(index)) placeByFlow(flow, block, index, geometry, report);
  });

  return flow.placements;
}

/**
 * Assigns every block a column and a rectangle.
 *
 * Exactly one placement is produced per block. Placements are returned in
 * the order they were made; use `blockIndex` to map them back to blocks.
 */
export function distributeSections(
  blocks: ContentBlock[],
  geometry: PageGeometry,
  options: DistributeOptions = {},
): SectionPlacement[] {
  const report = options.onDiagnostic ?? createConsoleDiagnosticSink('distributeSections');
  const template = options.template;

  if (template && template.slots.length > 0) {
    layoutLog(`[distributeSections] template ${template.id}: ${template.slots.length} slots, ${blocks.length} blocks`);
    return distributeWithTemplate(blocks, template, geometry, report);
  }

  layoutLog(`[distributeSections] automatic flow: ${blocks.length} blocks`);
  return distributeByFlow(blocks, geometry, report);
}
