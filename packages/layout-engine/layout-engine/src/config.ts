import { z } from 'zod';
import type { LayoutConfig, LayoutConfigOverrides } from '@slidegrid/contracts';
import { LayoutContractError } from './errors.js';

const positive = z.number().finite().positive();
const nonNegative = z.number().finite().nonnegative();
const color = z.string().min(1);

// Defaults describe an A3 landscape page split into two columns.
const configSchema = z.object({
  page: z
    .object({
      widthMm: positive.default(420),
      heightMm: positive.default(297),
      backgroundColor: color.default('#FFFFFF'),
    })
    .default({}),
  margins: z
    .object({
      topMm: nonNegative.default(10),
      bottomMm: nonNegative.default(10),
      leftMm: nonNegative.default(15),
      rightMm: nonNegative.default(15),
    })
    .default({}),
  headerHeightMm: nonNegative.default(25),
  footerHeightMm: nonNegative.default(12),
  grid: z
    .object({
      columnCount: z.number().int().positive().default(2),
      columnGapMm: nonNegative.default(10),
      sectionGapMm: nonNegative.default(8),
    })
    .default({}),
  typography: z
    .object({
      fontFamily: z.string().min(1).default('Meiryo'),
      titlePt: positive.default(28),
      sectionHeaderPt: positive.default(18),
      bodyPt: positive.default(14),
      footerPt: positive.default(10),
      tableHeaderPt: positive.default(12),
      tableBodyPt: positive.default(11),
      kpiValuePt: positive.default(32),
      kpiCaptionPt: positive.default(12),
    })
    .default({}),
  colors: z
    .object({
      primary: color.default('#2B6CB0'),
      secondary: color.default('#4A5568'),
      background: color.default('#FFFFFF'),
      accentBg: color.default('#EBF8FF'),
      border: color.default('#E2E8F0'),
      alert: color.default('#C53030'),
    })
    .default({}),
  autoShrink: z.object({ minFontPt: positive.default(8) }).default({}),
  components: z
    .object({
      bullets: z
        .object({
          marker: z.string().default('・'),
          indentMm: nonNegative.default(5),
          lineHeightMm: positive.default(8),
        })
        .default({}),
      table: z.object({ rowHeightMm: positive.default(8) }).default({}),
      flowchart: z
        .object({
          stepHeightMm: positive.default(25),
          verticalStepHeightMm: positive.default(18),
        })
        .default({}),
    })
    .default({}),
});

/**
 * Merges `overrides` onto the defaults and validates the result.
 *
 * @throws LayoutContractError with code `INVALID_CONFIG` when a value is out of
 * range (non-positive page size, negative margin, non-integer column count...)
 */
export function resolveLayoutConfig(overrides: LayoutConfigOverrides = {}): LayoutConfig {
  const parsed = configSchema.safeParse(overrides);
  if (!parsed.success) {
    const summary = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new LayoutContractError('INVALID_CONFIG', `Invalid layout configuration: ${summary}`, {
      issues: parsed.error.issues,
    });
  }
  const config: LayoutConfig = parsed.data;
  return config;
}

export const DEFAULT_LAYOUT_CONFIG: LayoutConfig = resolveLayoutConfig();
