import { describe, expect, it, vi } from 'vitest';
import type { ContentBlock, LayoutDiagnostic, SectionPlacement, SlideTemplate, TemplateSlot } from '@slidegrid/contracts';
import { resolveLayoutConfig } from './config.js';
import { clampColumnHint, clampToSlot, distributeSections } from './distribute.js';
import { computeGeometry } from './geometry.js';
import { bullets, flowchart, kpi, table, text } from './test-utils/blocks.js';

const geometry = computeGeometry(resolveLayoutConfig());

const slot = (id: string, column: number, minHeightMm = 0, maxHeightMm = 999): TemplateSlot => ({
  id,
  column,
  order: 0,
  minHeightMm,
  maxHeightMm,
});

const template = (...slots: TemplateSlot[]): SlideTemplate => ({ id: 'TX', name: 'Test', slots });

const collect = () => {
  const diagnostics: LayoutDiagnostic[] = [];
  return { diagnostics, onDiagnostic: (diagnostic: LayoutDiagnostic) => diagnostics.push(diagnostic) };
};

describe('clampColumnHint', () => {
  it('keeps in-range hints and zeroes the rest', () => {
    expect(clampColumnHint(1, 2)).toBe(1);
    expect(clampColumnHint(2, 2)).toBe(0);
    expect(clampColumnHint(-1, 2)).toBe(0);
    expect(clampColumnHint(null, 2)).toBe(0);
  });
});

describe('clampToSlot', () => {
  it('bounds the estimate on both sides', () => {
    expect(clampToSlot(10, slot('s', 0, 40, 90))).toBe(40);
    expect(clampToSlot(120, slot('s', 0, 40, 90))).toBe(90);
    expect(clampToSlot(55, slot('s', 0, 40, 90))).toBe(55);
  });
});

describe('distributeSections (automatic flow)', () => {
  it('stacks two bullet sections in column 0 separated by the section gap', () => {
    const placements = distributeSections([bullets(2), bullets(3)], geometry, { onDiagnostic: vi.fn() });

    expect(placements).toHaveLength(2);
    const [first, second] = placements;
    expect(first).toMatchObject({ column: 0, x: 15, y: 35, width: 190, height: 31, source: 'flow' });
    expect(second).toMatchObject({ column: 0, y: first.y + (10 + 2 * 8 + 5) + 8, height: 39 });
  });

  it('sends an out-of-range hint to column 0 and reports it', () => {
    const { diagnostics, onDiagnostic } = collect();
    const placements = distributeSections([text('hello', { id: 'far', column: 99 })], geometry, { onDiagnostic });

    expect(placements[0].column).toBe(0);
    expect(diagnostics).toEqual([
      expect.objectContaining({
        code: 'column-clamped',
        level: 'warn',
        details: { index: 0, sectionId: 'far', hint: 99, columnCount: 2 },
      }),
    ]);
  });

  it('reports a missing hint at info level', () => {
    const { diagnostics, onDiagnostic } = collect();
    distributeSections([kpi('1', '', 'x', { column: null })], geometry, { onDiagnostic });

    expect(diagnostics.map((d) => [d.code, d.level])).toEqual([['column-clamped', 'info']]);
    expect(diagnostics[0].message).toBe('Section section-0 has no column hint; defaulting to 0');
  });

  it('keeps per-column cursors independent', () => {
    const placements = distributeSections(
      [bullets(1, { column: 1 }), bullets(1, { column: 0 }), bullets(1, { column: 1 })],
      geometry,
      { onDiagnostic: vi.fn() },
    );

    expect(placements.map((p) => [p.column, p.x, p.y])).toEqual([
      [1, 215, 35],
      [0, 15, 35],
      [1, 215, 35 + 23 + 8],
    ]);
  });

  it('names id-less sections by input index', () => {
    const placements = distributeSections([text('a'), text('b', { id: 'named' })], geometry, { onDiagnostic: vi.fn() });
    expect(placements.map((p) => p.sectionId)).toEqual(['section-0', 'named']);
  });

  it('returns nothing for no blocks', () => {
    expect(distributeSections([], geometry, { onDiagnostic: vi.fn() })).toEqual([]);
  });

  it('treats a template without slots as absent', () => {
    const placements = distributeSections([bullets(2)], geometry, { template: template(), onDiagnostic: vi.fn() });
    expect(placements[0].source).toBe('flow');
  });
});

describe('distributeSections (template-guided flow)', () => {
  it('matches by id first, then by column, then appends leftovers', () => {
    const blocks: ContentBlock[] = [
      bullets(2, { id: 'a', column: 0 }),
      text('hi', { id: 'intro', column: 0 }),
      bullets(10, { id: 'b', column: 1 }),
    ];
    const placements = distributeSections(blocks, geometry, {
      template: template(slot('intro', 1, 40, 60), slot('other', 0)),
      onDiagnostic: vi.fn(),
    });

    expect(placements).toEqual<SectionPlacement[]>([
      { sectionId: 'intro', blockIndex: 1, column: 1, x: 215, y: 35, width: 190, height: 40, source: 'slot', slotId: 'intro' },
      { sectionId: 'a', blockIndex: 0, column: 0, x: 15, y: 35, width: 190, height: 31, source: 'slot', slotId: 'other' },
      { sectionId: 'b', blockIndex: 2, column: 1, x: 215, y: 83, width: 190, height: 95, source: 'flow' },
    ]);
  });

  it('clamps a matched estimate down to the slot maximum', () => {
    const placements = distributeSections([bullets(5, { id: 's' })], geometry, {
      template: template(slot('s', 0, 0, 20)),
      onDiagnostic: vi.fn(),
    });
    expect(placements[0].height).toBe(20);
  });

  it('lets the slot column win over the block hint on an id match', () => {
    const placements = distributeSections([bullets(1, { id: 'right', column: 0 })], geometry, {
      template: template(slot('right', 1)),
      onDiagnostic: vi.fn(),
    });
    expect(placements[0]).toMatchObject({ column: 1, x: 215, slotId: 'right' });
  });

  it('matches a block without a hint to any slot column', () => {
    const placements = distributeSections([bullets(1, { column: null })], geometry, {
      template: template(slot('only', 1)),
      onDiagnostic: vi.fn(),
    });
    expect(placements[0]).toMatchObject({ column: 1, source: 'slot', slotId: 'only' });
  });

  it('skips slots nothing matches', () => {
    const placements = distributeSections([bullets(1, { column: 0 })], geometry, {
      template: template(slot('ghost', 1)),
      onDiagnostic: vi.fn(),
    });
    expect(placements).toHaveLength(1);
    expect(placements[0]).toMatchObject({ column: 0, source: 'flow' });
  });

  it('takes the first of duplicated ids', () => {
    const placements = distributeSections([text('one', { id: 'dup' }), text('two', { id: 'dup' })], geometry, {
      template: template(slot('dup', 1)),
      onDiagnostic: vi.fn(),
    });
    expect(placements.map((p) => [p.blockIndex, p.source])).toEqual([
      [0, 'slot'],
      [1, 'flow'],
    ]);
  });

  it('clamps a slot column outside the geometry to 0', () => {
    const { diagnostics, onDiagnostic } = collect();
    const placements = distributeSections([bullets(1, { id: 'x' })], geometry, {
      template: template(slot('x', 5)),
      onDiagnostic,
    });

    expect(placements[0].column).toBe(0);
    expect(diagnostics.map((d) => d.code)).toEqual(['slot-column-clamped']);
  });
});

describe('distributeSections invariants', () => {
  const mixed = (seed: number): ContentBlock[] =>
    Array.from({ length: 12 }, (_, i) => {
      const column = ((seed + i * 7) % 5) - 1;
      const id = i % 3 === 0 ? `slot-${i % 4}` : null;
      switch ((seed + i) % 5) {
        case 0:
          return bullets(i % 4, { id, column });
        case 1:
          return table(['a', 'b'], [['1', '2']], { id, column });
        case 2:
          return flowchart(['x', 'y'], i % 2 === 0 ? 'h' : 'v', { id, column });
        case 3:
          return kpi('9', 'pt', 'score', { id, column });
        default:
          return text('z'.repeat(i * 13), { id, column });
      }
    });

  const slots = [slot('slot-0', 0, 30, 50), slot('slot-1', 1, 20, 40), slot('slot-2', 1, 0, 25), slot('missing', 0)];

  for (const seed of [0, 1, 2, 3, 4]) {
    for (const withTemplate of [false, true]) {
      it(`holds for seed ${seed} ${withTemplate ? 'with' : 'without'} a template`, () => {
        const blocks = mixed(seed);
        const placements = distributeSections(blocks, geometry, {
          template: withTemplate ? template(...slots) : undefined,
          onDiagnostic: vi.fn(),
        });

        expect(placements.map((p) => p.blockIndex).sort((a, b) => a - b)).toEqual(blocks.map((_, i) => i));

        for (const placement of placements) {
          expect(placement.column).toBeGreaterThanOrEqual(0);
          expect(placement.column).toBeLessThan(geometry.columnCount);
          if (placement.slotId !== undefined) {
            const matched = slots.find((s) => s.id === placement.slotId);
            expect(matched).toBeDefined();
            if (matched) {
              expect(placement.height).toBeGreaterThanOrEqual(matched.minHeightMm);
              expect(placement.height).toBeLessThanOrEqual(matched.maxHeightMm);
            }
          }
        }

        for (let column = 0; column < geometry.columnCount; column += 1) {
          const inColumn = placements.filter((p) => p.column === column);
          for (let i = 0; i + 1 < inColumn.length; i += 1) {
            expect(inColumn[i + 1].y).toBeGreaterThanOrEqual(inColumn[i].y + inColumn[i].height + geometry.sectionGap);
          }
        }
      });
    }
  }
});
