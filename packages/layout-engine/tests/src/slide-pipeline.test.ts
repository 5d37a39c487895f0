/**
 * End-to-end checks of the slide pipeline: raw generator output through
 * normalization, the bundled templates, placement and composition, then the
 * renderer-side font fitter on the composed text bodies.
 */

import { describe, expect, it } from 'vitest';
import type { LayoutDiagnostic, SectionLayout, TextBlockLayout } from '@slidegrid/contracts';
import { layoutSlide } from '@slidegrid/layout-engine';
import { fitTextBody } from '@slidegrid/measuring';

const problemSolvingInput = {
  recommended_template: 'T1',
  title: 'Reducing support backlog',
  subtitle: 'Proposal for the operations team',
  footer_note: 'Internal draft',
  sections: [
    {
      id: 'current_state',
      column: 0,
      header: 'Current state',
      type: 'bullets',
      content: { items: ['Queue grows weekly', { text: 'Median wait is two days', indent: 1 }, 'No triage rota'] },
    },
    { id: 'issues', column: 0, header: 'Issues', type: 'text_block', content: { text: 'q'.repeat(400) } },
    {
      id: 'solution',
      column: 1,
      header: 'Solution',
      type: 'flowchart',
      content: { steps: ['Triage', 'Assign', 'Resolve'], direction: 'v' },
    },
    {
      id: 'expected_effect',
      column: 1,
      header: 'Expected effect',
      type: 'kpi_box',
      content: { value: '-40', unit: '%', label: 'wait time' },
    },
    { id: 'notes', column: 1, header: 'Notes', type: 'memo', content: 'short' },
  ],
};

const isText = (layout: SectionLayout): layout is TextBlockLayout => layout.kind === 'text_block';

const collect = () => {
  const diagnostics: LayoutDiagnostic[] = [];
  return { diagnostics, onDiagnostic: (diagnostic: LayoutDiagnostic) => diagnostics.push(diagnostic) };
};

describe('slide pipeline with bundled templates', () => {
  it('fills the problem-solving slots and appends the extra section', () => {
    const { diagnostics, onDiagnostic } = collect();
    const layout = layoutSlide(problemSolvingInput, { onDiagnostic });

    expect(diagnostics).toEqual([]);
    expect(layout.templateId).toBe('T1');
    expect(layout.flow).toBe('template');
    expect(layout.sectionLayouts.map((s) => [s.sectionId, s.kind, s.column, s.placement.y, s.placement.height])).toEqual([
      ['current_state', 'bullets', 0, 35, 40],
      ['issues', 'text_block', 0, 83, 75],
      ['solution', 'flowchart', 1, 35, 90],
      ['expected_effect', 'kpi_box', 1, 133, 45],
      ['notes', 'text_block', 1, 186, 21],
    ]);
  });

  it('shrinks long text to the largest size that fits its body', () => {
    const layout = layoutSlide(problemSolvingInput, { onDiagnostic: () => undefined });
    const bodies = layout.sectionLayouts.filter(isText).map((section) => section.body);

    expect(bodies[0]).toMatchObject({ x: 17, y: 93, width: 186, height: 63, startFontSizePt: 14, minFontSizePt: 8 });
    expect(bodies.map(fitTextBody)).toEqual([13, 14]);
  });

  it('truncates long text first when content limits are on', () => {
    const { diagnostics, onDiagnostic } = collect();
    const layout = layoutSlide(problemSolvingInput, { limits: true, onDiagnostic });
    const [issues] = layout.sectionLayouts.filter(isText);

    expect(Array.from(issues.body.text)).toHaveLength(203);
    expect(issues.body.text.endsWith('...')).toBe(true);
    expect(issues.placement.height).toBe(51);
    expect(diagnostics.map((d) => [d.code, d.details?.sectionId])).toEqual([['content-truncated', 'issues']]);
  });

  it('lays out every section inside the configured columns', () => {
    const layout = layoutSlide(problemSolvingInput, { onDiagnostic: () => undefined });
    for (const section of layout.sectionLayouts) {
      expect(section.column === 0 || section.column === 1).toBe(true);
      expect(section.placement.width).toBe(190);
    }
    expect(layout.pageSize).toEqual({ width: 420, height: 297 });
  });
});
