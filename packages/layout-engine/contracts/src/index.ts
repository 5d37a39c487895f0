export const CONTRACTS_VERSION = '1.0.0';

// ============================================================================
// Content description (input)
// ============================================================================

/** Block kinds the engine knows how to estimate and compose. */
export const CONTENT_BLOCK_TYPES = ['bullets', 'table', 'flowchart', 'kpi_box', 'text_block'] as const;

export type ContentBlockType = (typeof CONTENT_BLOCK_TYPES)[number];

export type FlowchartDirection = 'h' | 'v';

export type BulletItem = {
  text: string;
  /** Nesting level for hanging-indent styling. Passed through to the renderer untouched. */
  indent: number;
};

type ContentBlockBase = {
  /** Opaque identifier from the generator. May be missing or duplicated. */
  id: string | null;
  /** Column hint. Never trusted: the planner clamps it into range. */
  column: number | null;
  header: string;
};

export type BulletsBlock = ContentBlockBase & {
  type: 'bullets';
  content: { items: BulletItem[] };
};

export type TableBlock = ContentBlockBase & {
  type: 'table';
  content: { columns: string[]; rows: string[][] };
};

export type FlowchartBlock = ContentBlockBase & {
  type: 'flowchart';
  content: { steps: string[]; direction: FlowchartDirection };
};

export type KpiBlock = ContentBlockBase & {
  type: 'kpi_box';
  content: { value: string; unit: string; label: string };
};

export type TextBlock = ContentBlockBase & {
  type: 'text_block';
  content: { text: string };
};

export type ContentBlock = BulletsBlock | TableBlock | FlowchartBlock | KpiBlock | TextBlock;

/**
 * Normalized content description.
 *
 * Produced by the content adapter from whatever the text-to-structure
 * generator returned; every optional field has already been defaulted.
 */
export type ContentDescription = {
  templateId: string | null;
  title: string;
  subtitle: string;
  footerNote: string;
  sections: ContentBlock[];
};

/** Loose block shape as the generator may send it. */
export type ContentBlockInput = {
  id?: unknown;
  column?: unknown;
  header?: unknown;
  type?: unknown;
  content?: unknown;
};

/**
 * Loose content description as the generator may send it. Snake-case aliases
 * are accepted for the fields the generator emits under those names.
 */
export type ContentDescriptionInput = {
  templateId?: unknown;
  template_id?: unknown;
  recommended_template?: unknown;
  title?: unknown;
  subtitle?: unknown;
  footerNote?: unknown;
  footer_note?: unknown;
  sections?: unknown;
};

// ============================================================================
// Templates
// ============================================================================

export type TemplateSlot = {
  id: string;
  column: number;
  order: number;
  minHeightMm: number;
  maxHeightMm: number;
};

export type SlideTemplate = {
  id: string;
  name: string;
  /** Slots sorted by `order`; declaration order breaks ties. */
  slots: TemplateSlot[];
};

export type TemplateResolver = {
  resolve(templateId: string | null): SlideTemplate | undefined;
};

// ============================================================================
// Configuration
// ============================================================================

export type LayoutConfig = {
  page: { widthMm: number; heightMm: number; backgroundColor: string };
  margins: { topMm: number; bottomMm: number; leftMm: number; rightMm: number };
  headerHeightMm: number;
  footerHeightMm: number;
  grid: { columnCount: number; columnGapMm: number; sectionGapMm: number };
  typography: {
    fontFamily: string;
    titlePt: number;
    sectionHeaderPt: number;
    bodyPt: number;
    footerPt: number;
    tableHeaderPt: number;
    tableBodyPt: number;
    kpiValuePt: number;
    kpiCaptionPt: number;
  };
  colors: {
    primary: string;
    secondary: string;
    background: string;
    accentBg: string;
    border: string;
    alert: string;
  };
  autoShrink: { minFontPt: number };
  components: {
    bullets: { marker: string; indentMm: number; lineHeightMm: number };
    table: { rowHeightMm: number };
    flowchart: { stepHeightMm: number; verticalStepHeightMm: number };
  };
};

type DeepPartial<T> = { [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K] };

export type LayoutConfigOverrides = DeepPartial<LayoutConfig>;

// ============================================================================
// Geometry and placement
// ============================================================================

export type Rect = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export type PageSize = { width: number; height: number };

/** Fixed page regions derived once per call from a `LayoutConfig`. All values in mm. */
export type PageGeometry = {
  pageSize: PageSize;
  margins: { top: number; right: number; bottom: number; left: number };
  header: Rect;
  body: Rect;
  footer: Rect;
  columns: Rect[];
  columnCount: number;
  columnGap: number;
  sectionGap: number;
  contentWidth: number;
  contentHeight: number;
  columnWidth: number;
};

export type PlacementSource = 'slot' | 'flow';

export type SectionPlacement = Rect & {
  sectionId: string;
  /** Index of the block in the content description's `sections`. */
  blockIndex: number;
  column: number;
  source: PlacementSource;
  slotId?: string;
};

// ============================================================================
// Layout output
// ============================================================================

export type TextAlign = 'left' | 'center' | 'right';

export type TextBox = Rect & {
  text: string;
  fontSizePt: number;
  bold: boolean;
  color: string | null;
  align: TextAlign;
};

/** Fixed-height labeled bar drawn at the top of every section. */
export type SectionHeaderBar = Rect & {
  text: string;
  fontSizePt: number;
};

export type SectionLayoutBase = {
  sectionId: string;
  column: number;
  placement: Rect;
  header: SectionHeaderBar;
};

export type BulletLine = Rect & {
  text: string;
  marker: string;
  indentLevel: number;
};

export type BulletsLayout = SectionLayoutBase & {
  kind: 'bullets';
  items: BulletLine[];
};

export type TableCell = Rect & {
  text: string;
  row: number;
  column: number;
  isHeader: boolean;
};

export type TableGrid = Rect & {
  columns: string[];
  rows: string[][];
  columnWidth: number;
  rowHeight: number;
  cells: TableCell[];
  headerFontSizePt: number;
  bodyFontSizePt: number;
};

export type TableLayout = SectionLayoutBase & {
  kind: 'table';
  table: TableGrid;
};

export type FlowchartStep = Rect & {
  text: string;
  index: number;
};

export type FlowchartConnector = {
  from: number;
  to: number;
  start: { x: number; y: number };
  end: { x: number; y: number };
};

export type FlowchartLayout = SectionLayoutBase & {
  kind: 'flowchart';
  direction: FlowchartDirection;
  steps: FlowchartStep[];
  connectors: FlowchartConnector[];
};

export type KpiLayout = SectionLayoutBase & {
  kind: 'kpi_box';
  frame: Rect;
  value: TextBox;
  caption: TextBox;
  unit: string;
  label: string;
};

/**
 * Body box of a text block. The font size is chosen later by the auto-shrink
 * fitter, starting at `startFontSizePt` and never going below `minFontSizePt`.
 */
export type TextBody = Rect & {
  text: string;
  startFontSizePt: number;
  minFontSizePt: number;
};

export type TextBlockLayout = SectionLayoutBase & {
  kind: 'text_block';
  body: TextBody;
};

export type SectionLayout = BulletsLayout | TableLayout | FlowchartLayout | KpiLayout | TextBlockLayout;

export type HeaderLayout = {
  band: Rect;
  title: TextBox;
  subtitle: TextBox;
};

export type FooterLayout = TextBox;

export type SlideTheme = {
  fontFamily: string;
  backgroundColor: string;
  colors: LayoutConfig['colors'];
};

export type SlideLayout = {
  /** Template id declared by the content description, or null when none was declared. */
  templateId: string | null;
  /** Whether a resolved template guided placement or automatic flow was used. */
  flow: 'template' | 'automatic';
  pageSize: PageSize;
  theme: SlideTheme;
  headerLayout: HeaderLayout;
  /** One entry per content block, in input order. */
  sectionLayouts: SectionLayout[];
  footerLayout: FooterLayout;
};

// ============================================================================
// Diagnostics
// ============================================================================

export type LayoutDiagnosticCode =
  | 'column-clamped'
  | 'slot-column-clamped'
  | 'template-fallback'
  | 'template-unknown-id'
  | 'template-file-missing'
  | 'template-invalid'
  | 'template-empty'
  | 'content-truncated';

export type LayoutDiagnostic = {
  code: LayoutDiagnosticCode;
  level: 'info' | 'warn';
  message: string;
  details?: Record<string, unknown>;
};

export type DiagnosticSink = (diagnostic: LayoutDiagnostic) => void;

/**
 * Builds the default sink used when a caller passes none: diagnostics are
 * written to the console with a bracketed source prefix.
 */
export const createConsoleDiagnosticSink =
  (source: string): DiagnosticSink =>
  (diagnostic) => {
    if (diagnostic.level === 'warn') {
      console.warn(`[${source}] ${diagnostic.message}`, diagnostic.details ?? {});
    } else {
      console.info(`[${source}] ${diagnostic.message}`, diagnostic.details ?? {});
    }
  };
