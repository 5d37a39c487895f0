import { describe, expect, it } from 'vitest';
import { DEFAULT_LAYOUT_CONFIG, resolveLayoutConfig } from './config.js';
import { LayoutContractError } from './errors.js';

describe('resolveLayoutConfig', () => {
  it('fills every default', () => {
    expect(DEFAULT_LAYOUT_CONFIG.page).toEqual({ widthMm: 420, heightMm: 297, backgroundColor: '#FFFFFF' });
    expect(DEFAULT_LAYOUT_CONFIG.margins).toEqual({ topMm: 10, bottomMm: 10, leftMm: 15, rightMm: 15 });
    expect(DEFAULT_LAYOUT_CONFIG.headerHeightMm).toBe(25);
    expect(DEFAULT_LAYOUT_CONFIG.footerHeightMm).toBe(12);
    expect(DEFAULT_LAYOUT_CONFIG.grid).toEqual({ columnCount: 2, columnGapMm: 10, sectionGapMm: 8 });
    expect(DEFAULT_LAYOUT_CONFIG.autoShrink.minFontPt).toBe(8);
    expect(DEFAULT_LAYOUT_CONFIG.components.bullets).toEqual({ marker: '・', indentMm: 5, lineHeightMm: 8 });
    expect(DEFAULT_LAYOUT_CONFIG.components.table.rowHeightMm).toBe(8);
  });

  it('merges nested overrides without dropping sibling defaults', () => {
    const config = resolveLayoutConfig({ margins: { topMm: 20 }, typography: { bodyPt: 12 } });

    expect(config.margins).toEqual({ topMm: 20, bottomMm: 10, leftMm: 15, rightMm: 15 });
    expect(config.typography.bodyPt).toBe(12);
    expect(config.typography.titlePt).toBe(28);
  });

  it('returns a fresh object each call', () => {
    const first = resolveLayoutConfig();
    const second = resolveLayoutConfig();
    expect(first).not.toBe(second);
    expect(first).toEqual(second);
  });

  it('rejects a non-integer column count with INVALID_CONFIG', () => {
    let caught: unknown;
    try {
      resolveLayoutConfig({ grid: { columnCount: 1.5 } });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(LayoutContractError);
    expect(caught).toMatchObject({ code: 'INVALID_CONFIG', name: 'LayoutContractError' });
    expect(String(caught)).toContain('grid.columnCount');
  });

  it('rejects negative margins and non-positive page sizes', () => {
    expect(() => resolveLayoutConfig({ margins: { leftMm: -1 } })).toThrow(LayoutContractError);
    expect(() => resolveLayoutConfig({ page: { heightMm: 0 } })).toThrow(LayoutContractError);
  });
});
