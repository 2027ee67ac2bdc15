// ═══════════════════════════════════════════════════════════════════════════════
// EXPORT RANGE — Copy Command to Row/Column Selection
// ═══════════════════════════════════════════════════════════════════════════════

import type { ExportOptions } from '../config/index.js';
import type { ScreenSelection, TableLayout } from '../table/types.js';
import { err, ok, type Result } from '../types/result.js';
import {
  InvalidArgumentError,
  isDelimitedFormat,
  isInsertFormat,
  type ColumnSpan,
  type ExportPlan,
  type ExportRequest,
  type RowFilter,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// VIEW STATE
// ─────────────────────────────────────────────────────────────────────────────────

export interface CursorPosition {
  /** Data row under the cursor, counted from the first data row */
  row: number;
  /** Table column under the vertical cursor, zero-based */
  column: number;
}

export interface ExportView {
  layout: TableLayout;
  cursor: CursorPosition;
  selection: ScreenSelection;
}

function hasSelection(selection: ScreenSelection): boolean {
  return (
    (selection.rows !== null && selection.rows.count > 0) ||
    (selection.columns !== null && selection.columns.count > 0)
  );
}

/**
 * Number of data rows a top/bottom export takes: the explicit count, or the
 * given percentage of all data rows rounded down, never more than there are.
 */
export function topRowCount(totalRows: number, rows: number, percent: number): number {
  const wanted = percent !== 0 ? Math.floor((totalRows * percent) / 100) : Math.floor(rows);
  return Math.min(Math.max(wanted, 0), totalRows);
}

// ─────────────────────────────────────────────────────────────────────────────────
// PLANNING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Decide which rows and display columns a copy command covers, which
 * structural rows are printed, and the effective format.
 */
export function computeExportPlan(
  request: ExportRequest,
  view: ExportView,
  options: ExportOptions
): Result<ExportPlan, InvalidArgumentError> {
  const { layout, cursor, selection } = view;
  const command = request.command;
  const selected = hasSelection(selection);

  const extendedLine = command === 'copy-line-extended';
  const format = extendedLine && !isDelimitedFormat(request.format) ? 'csv' : request.format;
  const saveColumnNames = extendedLine || isInsertFormat(format);

  let minRow = layout.firstDataRow;
  let maxRow = layout.lastRow;
  let columns: ColumnSpan | null = null;
  let rowFilter: RowFilter = 'none';

  let printHeader = true;
  let printHeaderLine = true;
  let printBorder = true;
  let printFooter = true;

  if (
    command === 'copy-line' ||
    extendedLine ||
    (command === 'copy' && !options.noCursor && !selected)
  ) {
    minRow = maxRow = cursor.row + layout.firstDataRow;
    printFooter = false;
  }

  if ((command === 'copy' && options.verticalCursor) || command === 'copy-column') {
    const extent = layout.columnExtents[cursor.column];
    if (!extent) {
      return err(new InvalidArgumentError(
        `cursor column ${cursor.column} is outside the table (${layout.columns} columns)`
      ));
    }
    columns = { first: extent.xmin, last: extent.xmax };
    printFooter = false;
  }

  // the cell under both cursors
  if (command === 'copy' && !options.noCursor && options.verticalCursor) {
    printHeader = false;
    printHeaderLine = false;
    printBorder = false;
  }

  if (command === 'copy-top-lines' || command === 'copy-bottom-lines') {
    const rows = request.rows ?? 0;
    const percent = request.percent ?? 0;

    if (rows < 0 || percent < 0) {
      return err(new InvalidArgumentError('arguments ("rows" or "percent") of the export are negative'));
    }

    const totalRows = Math.max(0, layout.lastDataRow - layout.firstDataRow + 1);
    const count = topRowCount(totalRows, rows, percent);
    const skip = command === 'copy-bottom-lines' ? totalRows - count : 0;

    minRow = layout.firstDataRow + skip;
    maxRow = layout.firstDataRow + skip + count - 1;
    printFooter = false;
  }

  if (command === 'copy-marked-lines') {
    rowFilter = 'bookmarked';
    printFooter = false;
  } else if (command === 'copy-searched-lines') {
    rowFilter = 'search-matched';
    printFooter = false;
  }

  if ((command === 'copy' && selected) || command === 'copy-selected') {
    if (selection.rows !== null) {
      minRow = selection.rows.first + layout.firstDataRow;
      maxRow = minRow + selection.rows.count - 1;
    }

    if (selection.columns !== null && selection.columns.count > 0) {
      columns = {
        first: selection.columns.first,
        last: selection.columns.first + selection.columns.count - 1,
      };
    }

    if (minRow > layout.firstDataRow || maxRow < layout.lastDataRow) {
      printFooter = false;
    }
  }

  if (format !== 'text') {
    printBorder = false;
    printFooter = false;
    printHeaderLine = false;
  }

  if (saveColumnNames) {
    printHeader = true;
  }

  return ok({
    range: { minRow, maxRow, columns },
    format,
    extendedLine,
    saveColumnNames,
    rowFilter,
    printHeader,
    printHeaderLine,
    printBorder,
    printFooter,
  });
}
