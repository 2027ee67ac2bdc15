// ═══════════════════════════════════════════════════════════════════════════════
// TABLE TYPES — Templates, Layout, Line Metadata, Screen State
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// TEMPLATE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Structural role of one display column of a rendered row.
 */
export type ColumnRole =
  | 'data'          // cell content
  | 'separator'     // inner vertical line between two cells
  | 'left-border'   // outer vertical line on the left
  | 'right-border'  // outer vertical line on the right
  | 'end';          // nothing of the row follows

/**
 * Role of every display column of a row class, indexed by display x.
 */
export type TemplateLine = readonly ColumnRole[];

/**
 * Inclusive display-column span of one table column's cells.
 */
export interface ColumnExtent {
  readonly xmin: number;
  readonly xmax: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LAYOUT
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Row boundaries of a rendered table. Row numbers are zero-based line
 * numbers of the line buffer; -1 marks an absent row.
 */
export interface TableLayout {
  readonly firstDataRow: number;
  readonly lastDataRow: number;
  readonly lastRow: number;
  readonly borderTopRow: number;
  readonly borderHeadRow: number;
  readonly borderBottomRow: number;
  /** Rows above the data that stay on screen: titles, column names, header line */
  readonly fixedRows: number;
  readonly footerRow: number;
  readonly columns: number;
  readonly columnExtents: readonly ColumnExtent[];
  readonly template: TemplateLine;
  /** Template for header rows when it differs from the data rows' one */
  readonly headerTemplate?: TemplateLine;
}

export type RowKind =
  | 'data'
  | 'border'
  | 'header-line'
  | 'header'
  | 'footer'
  | 'other';

// ─────────────────────────────────────────────────────────────────────────────────
// LINE METADATA
// ─────────────────────────────────────────────────────────────────────────────────

export interface LineInfo {
  bookmark: boolean;
  /** Search match flag; undefined until a search has examined the line */
  foundStr?: boolean;
}

export interface Line {
  readonly text: string;
  readonly rowNumber: number;
  readonly info: LineInfo | null;
}

// ─────────────────────────────────────────────────────────────────────────────────
// SCREEN STATE
// ─────────────────────────────────────────────────────────────────────────────────

export interface Span {
  readonly first: number;
  readonly count: number;
}

/**
 * Current selection on screen. Row spans count data rows from zero;
 * column spans are display columns.
 */
export interface ScreenSelection {
  readonly rows: Span | null;
  readonly columns: Span | null;
}

export const NO_SELECTION: ScreenSelection = { rows: null, columns: null };
