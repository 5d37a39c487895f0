import type { FooterLayout, HeaderLayout, LayoutConfig, PageGeometry } from '@slidegrid/contracts';

const TITLE_HEIGHT_MM = 15;
const SUBTITLE_OFFSET_MM = 18;
const SUBTITLE_HEIGHT_MM = 7;

export function layoutHeader(
  title: string,
  subtitle: string,
  geometry: PageGeometry,
  config: LayoutConfig,
): HeaderLayout {
  const { x, y, width } = geometry.header;
  return {
    band: { ...geometry.header },
    title: {
      text: title,
      x,
      y,
      width,
      height: TITLE_HEIGHT_MM,
      fontSizePt: config.typography.titlePt,
      bold: true,
      color: config.colors.primary,
      align: 'left',
    },
    subtitle: {
      text: subtitle,
      x,
      y: y + SUBTITLE_OFFSET_MM,
      width,
      height: SUBTITLE_HEIGHT_MM,
      fontSizePt: config.typography.bodyPt,
      bold: false,
      color: config.colors.secondary,
      align: 'left',
    },
  };
}

export function layoutFooter(footerNote: string, geometry: PageGeometry, config: LayoutConfig): FooterLayout {
  return {
    ...geometry.footer,
    text: footerNote,
    fontSizePt: config.typography.footerPt,
    bold: false,
    color: config.colors.secondary,
    align: 'left',
  };
}
