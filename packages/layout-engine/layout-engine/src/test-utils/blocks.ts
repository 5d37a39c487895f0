import type {
  BulletsBlock,
  FlowchartBlock,
  FlowchartDirection,
  KpiBlock,
  TableBlock,
  TextBlock,
} from '@slidegrid/contracts';

type BlockMeta = { id?: string | null; column?: number | null; header?: string };

const meta = (overrides: BlockMeta) => ({
  id: overrides.id ?? null,
  column: overrides.column === undefined ? 0 : overrides.column,
  header: overrides.header ?? '',
});

export const bullets = (count: number, overrides: BlockMeta = {}): BulletsBlock => ({
  type: 'bullets',
  ...meta(overrides),
  content: { items: Array.from({ length: count }, (_, i) => ({ text: `item ${i + 1}`, indent: 0 })) },
});

export const table = (columns: string[], rows: string[][], overrides: BlockMeta = {}): TableBlock => ({
  type: 'table',
  ...meta(overrides),
  content: { columns, rows },
});

export const flowchart = (
  steps: string[],
  direction: FlowchartDirection = 'h',
  overrides: BlockMeta = {},
): FlowchartBlock => ({
  type: 'flowchart',
  ...meta(overrides),
  content: { steps, direction },
});

export const kpi = (value: string, unit: string, label: string, overrides: BlockMeta = {}): KpiBlock => ({
  type: 'kpi_box',
  ...meta(overrides),
  content: { value, unit, label },
});

export const text = (body: string, overrides: BlockMeta = {}): TextBlock => ({
  type: 'text_block',
  ...meta(overrides),
  content: { text: body },
});
