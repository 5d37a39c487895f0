import type { LayoutConfig, PageGeometry, Rect } from '@slidegrid/contracts';
import { LayoutContractError } from './errors.js';

/**
 * Derives the fixed page regions from configuration.
 *
 * Columns are laid out left to right, each spanning the full body height
 * below the header band. The result is computed fresh on every call.
 *
 * @throws LayoutContractError when the page size or column count is not
 * positive, when a margin, band or gap is negative or not finite, or when
 * they leave no room for content
 */
export function computeGeometry(config: LayoutConfig): PageGeometry {
  const { widthMm: pageWidth, heightMm: pageHeight } = config.page;
  const { topMm: top, bottomMm: bottom, leftMm: left, rightMm: right } = config.margins;
  const { columnCount, columnGapMm: columnGap, sectionGapMm: sectionGap } = config.grid;

  if (!(pageWidth > 0) || !(pageHeight > 0)) {
    throw new LayoutContractError('INVALID_CONFIG', 'computeGeometry: page size must be positive', {
      pageWidth,
      pageHeight,
    });
  }
  if (!Number.isInteger(columnCount) || columnCount < 1) {
    throw new LayoutContractError('INVALID_CONFIG', 'computeGeometry: column count must be a positive integer', {
      columnCount,
    });
  }

  const lengths = {
    topMargin: top,
    bottomMargin: bottom,
    leftMargin: left,
    rightMargin: right,
    headerHeight: config.headerHeightMm,
    footerHeight: config.footerHeightMm,
    columnGap,
    sectionGap,
  };
  const invalidLengths = Object.entries(lengths).filter(([, value]) => !Number.isFinite(value) || value < 0);
  if (invalidLengths.length > 0) {
    throw new LayoutContractError(
      'INVALID_CONFIG',
      `computeGeometry: margins, bands and gaps must be finite and non-negative (${invalidLengths.map(([name]) => name).join(', ')})`,
      Object.fromEntries(invalidLengths),
    );
  }

  const contentWidth = pageWidth - left - right;
  const contentHeight = pageHeight - top - bottom - config.headerHeightMm - config.footerHeightMm;

  if (!(contentWidth > 0) || !(contentHeight > 0)) {
    throw new LayoutContractError(
      'NON_POSITIVE_CONTENT_AREA',
      'computeGeometry: page size, margins and bands yield non-positive content area',
      { contentWidth, contentHeight },
    );
  }

  const columnWidth = (contentWidth - columnGap * (columnCount - 1)) / columnCount;
  if (!(columnWidth > 0)) {
    throw new LayoutContractError('NON_POSITIVE_COLUMN_WIDTH', 'computeGeometry: column gaps leave no column width', {
      contentWidth,
      columnGap,
      columnCount,
    });
  }

  const bodyTop = top + config.headerHeightMm;
  const columns: Rect[] = Array.from({ length: columnCount }, (_, index) => ({
    x: left + index * (columnWidth + columnGap),
    y: bodyTop,
    width: columnWidth,
    height: contentHeight,
  }));

  return {
    pageSize: { width: pageWidth, height: pageHeight },
    margins: { top, right, bottom, left },
    header: { x: left, y: top, width: contentWidth, height: config.headerHeightMm },
    body: { x: left, y: bodyTop, width: contentWidth, height: contentHeight },
    footer: {
      x: left,
      y: pageHeight - bottom - config.footerHeightMm,
      width: contentWidth,
      height: config.footerHeightMm,
    },
    columns,
    columnCount,
    columnGap,
    sectionGap,
    contentWidth,
    contentHeight,
    columnWidth,
  };
}
