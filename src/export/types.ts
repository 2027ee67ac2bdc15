// ═══════════════════════════════════════════════════════════════════════════════
// EXPORT TYPES — Formats, Copy Commands, Tokens, Ranges, Errors
// ═══════════════════════════════════════════════════════════════════════════════

import type { ColumnRole } from '../table/types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// EXPORT FORMATS
// ─────────────────────────────────────────────────────────────────────────────────

export type ExportFormat =
  | 'text'              // rendered table slice, verbatim
  | 'csv'
  | 'tsv'
  | 'insert'            // one INSERT statement per line
  | 'insert-commented'; // one value per line, each with a column comment

export const EXPORT_FORMATS = ['text', 'csv', 'tsv', 'insert', 'insert-commented'] as const;

export function isInsertFormat(format: ExportFormat): boolean {
  return format === 'insert' || format === 'insert-commented';
}

export function isDelimitedFormat(format: ExportFormat): boolean {
  return format === 'csv' || format === 'tsv';
}

export const MIME_TYPES: Record<ExportFormat, string> = {
  text: 'text/plain',
  csv: 'text/csv',
  tsv: 'text/tab-separated-values',
  insert: 'application/sql',
  'insert-commented': 'application/sql',
};

export const FILE_EXTENSIONS: Record<ExportFormat, string> = {
  text: '.txt',
  csv: '.csv',
  tsv: '.tsv',
  insert: '.sql',
  'insert-commented': '.sql',
};

// ─────────────────────────────────────────────────────────────────────────────────
// COPY COMMANDS
// ─────────────────────────────────────────────────────────────────────────────────

export type CopyCommand =
  | 'copy'                 // cursor cell, cursor line or selection, by screen state
  | 'copy-all'
  | 'copy-line'
  | 'copy-line-extended'   // one "column,value" line per column of the cursor row
  | 'copy-column'
  | 'copy-selected'
  | 'copy-top-lines'
  | 'copy-bottom-lines'
  | 'copy-marked-lines'
  | 'copy-searched-lines';

export const COPY_COMMANDS = [
  'copy',
  'copy-all',
  'copy-line',
  'copy-line-extended',
  'copy-column',
  'copy-selected',
  'copy-top-lines',
  'copy-bottom-lines',
  'copy-marked-lines',
  'copy-searched-lines',
] as const;

// ─────────────────────────────────────────────────────────────────────────────────
// TOKENS & FIELD VALUES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * One display column of a row (or, after coalescing, one whole field).
 * `xpos` is the display column where the (last) character starts.
 */
export interface Token {
  readonly role: ColumnRole;
  readonly text: string;
  readonly byteLength: number;
  readonly xpos: number;
}

/**
 * The value is the input slice, unchanged.
 */
export interface Borrowed {
  readonly kind: 'borrowed';
  readonly text: string;
  readonly byteLength: number;
}

/**
 * The value was rewritten (quoted, escaped or replaced).
 */
export interface Owned {
  readonly kind: 'owned';
  readonly text: string;
  readonly byteLength: number;
}

export type FieldText = Borrowed | Owned;

export function borrowed(text: string, byteLength: number): Borrowed {
  return { kind: 'borrowed', text, byteLength };
}

export function owned(text: string, byteLength: number): Owned {
  return { kind: 'owned', text, byteLength };
}

export interface QuotingOptions {
  force8bit: boolean;
  emptyStringIsNull: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────────
// RANGES & PLANS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Inclusive display-column bounds.
 */
export interface ColumnSpan {
  readonly first: number;
  readonly last: number;
}

/**
 * Inclusive row bounds (buffer line numbers) and optional column bounds.
 * No row qualifies when minRow > maxRow.
 */
export interface ExportRange {
  readonly minRow: number;
  readonly maxRow: number;
  readonly columns: ColumnSpan | null;
}

export type RowFilter = 'none' | 'bookmarked' | 'search-matched';

export interface ExportPlan {
  readonly range: ExportRange;
  /** Format after command adjustments (extended line forces a delimited one) */
  readonly format: ExportFormat;
  readonly extendedLine: boolean;
  /** Header rows feed column names instead of output */
  readonly saveColumnNames: boolean;
  readonly rowFilter: RowFilter;
  readonly printHeader: boolean;
  readonly printHeaderLine: boolean;
  readonly printBorder: boolean;
  readonly printFooter: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────────
// REQUEST & RESULT
// ─────────────────────────────────────────────────────────────────────────────────

export interface ExportRequest {
  command: CopyCommand;
  format: ExportFormat;

  /** Row count for copy-top-lines / copy-bottom-lines */
  rows?: number;
  /** Percentage of data rows; takes precedence over rows when non-zero */
  percent?: number;

  /** Target table of INSERT statements */
  tableName?: string;
}

export interface ExportStats {
  rowsExported: number;
  bytesWritten: number;
  durationMs: number;
}

export interface ExportResult {
  format: ExportFormat;
  mimeType: string;
  fileExtension: string;
  sizeBytes: number;
  stats: ExportStats;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

export type ExportErrorCode = 'INVALID_ARGUMENT' | 'SINK_WRITE_FAILED';

export abstract class ExportError extends Error {
  abstract readonly code: ExportErrorCode;
}

/**
 * A request the exporter cannot serve; raised before anything is written.
 */
export class InvalidArgumentError extends ExportError {
  readonly name = 'InvalidArgumentError';
  readonly code = 'INVALID_ARGUMENT';
}

/**
 * The output sink refused a write. Bytes written before stay written.
 */
export class SinkWriteError extends ExportError {
  readonly name = 'SinkWriteError';
  readonly code = 'SINK_WRITE_FAILED';

  constructor(cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot write (${reason})`, { cause });
  }
}
