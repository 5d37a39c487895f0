/**
 * Heuristic text measurer for the auto-shrink fitter
 *
 * There is no font metric table behind these numbers. Every glyph is assumed
 * to be the same width and every line the same height, both proportional to
 * the font size:
 * - character width ≈ fontSize * 0.35 mm
 * - line height ≈ fontSize * 0.42 mm
 *
 * The results are a coarse approximation. Renderers must not assume a
 * pixel-perfect fit, and overflow after fitting is an accepted degradation.
 */

import type { TextBody } from '@slidegrid/contracts';

/** Millimetres of line width consumed per point of font size, per character. */
export const CHAR_WIDTH_MM_PER_PT = 0.35;

/** Millimetres of line height per point of font size. */
export const LINE_HEIGHT_MM_PER_PT = 0.42;

/** Font size decrement between fit attempts. */
export const SHRINK_STEP_PT = 1;

const countChars = (text: string): number => Array.from(text).length;

/**
 * Characters that fit on one line of `boxWidthMm` at `fontPt`. Never less
 * than 1, so a box narrower than one glyph still makes progress.
 */
export function charsPerLine(boxWidthMm: number, fontPt: number): number {
  const charWidthMm = fontPt * CHAR_WIDTH_MM_PER_PT;
  if (!(charWidthMm > 0)) return 1;
  return Math.max(1, Math.floor(boxWidthMm / charWidthMm));
}

/**
 * Estimated height of `text` wrapped into `boxWidthMm` at `fontPt`.
 *
 * @example
 * ```typescript
 * estimateWrappedHeight('x'.repeat(100), 80, 9); // 4 lines * 3.78mm = 15.12
 * ```
 */
export function estimateWrappedHeight(text: string, boxWidthMm: number, fontPt: number): number {
  const requiredLines = Math.ceil(countChars(text) / charsPerLine(boxWidthMm, fontPt));
  return requiredLines * fontPt * LINE_HEIGHT_MM_PER_PT;
}

/**
 * Finds the largest font size, stepping down 1pt at a time from
 * `startFontPt`, at which `text` fits the box under the heuristic model.
 *
 * Returns `minFontPt` when no size at or above the floor fits, regardless of
 * the overflow that remains. When `startFontPt` is already below the floor,
 * or either size is not finite, the floor is returned. Sizes too tall for a
 * single line in the box are skipped without measuring.
 */
export function fitFontSize(
  text: string,
  boxWidthMm: number,
  boxHeightMm: number,
  startFontPt: number,
  minFontPt: number,
): number {
  if (!Number.isFinite(startFontPt) || !Number.isFinite(minFontPt)) return minFontPt;

  const steps = Math.floor((startFontPt - minFontPt) / SHRINK_STEP_PT);
  // Non-empty text needs at least one line, so sizes whose line height alone exceeds the box are skipped.
  const firstStep =
    text.length > 0 ? Math.max(0, Math.floor((startFontPt - boxHeightMm / LINE_HEIGHT_MM_PER_PT) / SHRINK_STEP_PT)) : 0;
  for (let step = firstStep; step <= steps; step += 1) {
    const fontPt = startFontPt - step * SHRINK_STEP_PT;
    if (estimateWrappedHeight(text, boxWidthMm, fontPt) <= boxHeightMm) {
      return fontPt;
    }
  }
  return minFontPt;
}

/** Fits a composed text-block body using its own start and floor sizes. */
export const fitTextBody = (body: TextBody): number =>
  fitFontSize(body.text, body.width, body.height, body.startFontSizePt, body.minFontSizePt);
