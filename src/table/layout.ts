// ═══════════════════════════════════════════════════════════════════════════════
// TABLE LAYOUT — Row Boundaries and Column Extents of Rendered Tables
// ═══════════════════════════════════════════════════════════════════════════════

import { loggers } from '../logging/index.js';
import { columnExtents, translateHeadline } from './template.js';
import type { ColumnRole, RowKind, TableLayout, TemplateLine } from './types.js';
import { stringDisplayWidth } from './unicode.js';

// ─────────────────────────────────────────────────────────────────────────────────
// LINE CLASSIFIERS
// ─────────────────────────────────────────────────────────────────────────────────

const RULE_LINE = /^[\s+|│║┃├┼┤┝┿┥╞╪╡╟╫╢╠╬╣┌┬┐└┴┘╔╦╗╚╩╝┏┳┓┗┻┛-]*[-─═━][\s+|│║┃├┼┤┝┿┥╞╪╡╟╫╢╠╬╣┌┬┐└┴┘╔╦╗╚╩╝┏┳┓┗┻┛─═━-]*$/;

const FOOTER_LINE = /^\(\d+ rows?\)$/;

export function isRuleLine(line: string): boolean {
  return line.trim().length > 0 && RULE_LINE.test(line);
}

// Top and bottom frame corners read as junctions for the purpose of a template
const CORNERS: Record<string, string> = {
  '┌': '├', '┬': '┼', '┐': '┤',
  '└': '├', '┴': '┼', '┘': '┤',
  '╔': '╠', '╦': '╬', '╗': '╣',
  '╚': '╠', '╩': '╬', '╝': '╣',
  '┏': '┝', '┳': '┿', '┓': '┥',
  '┗': '┝', '┻': '┿', '┛': '┥',
};

function normalizeCorners(line: string): string {
  return Array.from(line, char => CORNERS[char] ?? char).join('');
}

// ─────────────────────────────────────────────────────────────────────────────────
// LAYOUT DETECTION
// ─────────────────────────────────────────────────────────────────────────────────

function plainTemplate(lines: readonly string[]): TemplateLine {
  const width = lines.reduce((max, line) => Math.max(max, stringDisplayWidth(line)), 0);
  return new Array<ColumnRole>(width).fill('data');
}

/**
 * Find the structure of a table as rendered by psql-like clients: optional
 * top border, column-name rows, the header line, data rows, optional bottom
 * border and a `(n rows)` footer.
 *
 * A text without a header line is treated as one column of data rows.
 */
export function describeTable(lines: readonly string[]): TableLayout {
  const logger = loggers.table();
  const lastRow = lines.length - 1;

  let lastNonEmpty = lastRow;
  while (lastNonEmpty >= 0 && lines[lastNonEmpty]?.trim() === '') {
    lastNonEmpty--;
  }

  const borderTopRow = lines.length > 0 && isRuleLine(lines[0] ?? '') ? 0 : -1;

  let borderHeadRow = -1;
  for (let rn = borderTopRow + 2; rn <= lastNonEmpty; rn++) {
    if (isRuleLine(lines[rn] ?? '')) {
      borderHeadRow = rn;
      break;
    }
  }

  if (borderHeadRow === -1) {
    const template = plainTemplate(lines);
    logger.debug('No header line found, using a single data column', { rows: lines.length });

    return {
      firstDataRow: 0,
      lastDataRow: lastNonEmpty,
      lastRow,
      borderTopRow: -1,
      borderHeadRow: -1,
      borderBottomRow: -1,
      fixedRows: 0,
      footerRow: lastNonEmpty < lastRow ? lastNonEmpty + 1 : -1,
      columns: template.length > 0 ? 1 : 0,
      columnExtents: template.length > 0 ? [{ xmin: 0, xmax: template.length - 1 }] : [],
      template,
    };
  }

  const hasRowCount =
    lastNonEmpty > borderHeadRow && FOOTER_LINE.test((lines[lastNonEmpty] ?? '').trim());

  // the row count line, else the blank tail after the table
  let footerRow = -1;
  if (hasRowCount) {
    footerRow = lastNonEmpty;
  } else if (lastNonEmpty < lastRow) {
    footerRow = lastNonEmpty + 1;
  }

  const afterData = hasRowCount ? lastNonEmpty - 1 : lastNonEmpty;
  // only framed tables have a bottom border; a data row of dashes stays data
  const borderBottomRow =
    borderTopRow !== -1 && afterData > borderHeadRow && isRuleLine(lines[afterData] ?? '')
      ? afterData
      : -1;

  const lastDataRow = borderBottomRow !== -1 ? borderBottomRow - 1 : afterData;
  const template = translateHeadline(normalizeCorners(lines[borderHeadRow] ?? ''));
  const extents = columnExtents(template);

  const layout: TableLayout = {
    firstDataRow: borderHeadRow + 1,
    lastDataRow,
    lastRow,
    borderTopRow,
    borderHeadRow,
    borderBottomRow,
    fixedRows: borderHeadRow + 1,
    footerRow,
    columns: extents.length,
    columnExtents: extents,
    template,
  };

  logger.debug('Table layout described', {
    rows: lines.length,
    columns: layout.columns,
    firstDataRow: layout.firstDataRow,
    lastDataRow: layout.lastDataRow,
    footerRow,
  });

  return layout;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROW CLASSIFICATION
// ─────────────────────────────────────────────────────────────────────────────────

export function classifyRow(layout: TableLayout, rowNumber: number): RowKind {
  if (rowNumber >= layout.firstDataRow && rowNumber <= layout.lastDataRow) {
    return 'data';
  }
  if (rowNumber === layout.borderTopRow || rowNumber === layout.borderBottomRow) {
    return 'border';
  }
  if (rowNumber === layout.borderHeadRow) {
    return 'header-line';
  }
  if (layout.footerRow !== -1 && rowNumber >= layout.footerRow) {
    return 'footer';
  }
  if (rowNumber < layout.fixedRows) {
    return 'header';
  }
  return 'other';
}

/**
 * Template to walk a row of the given kind with.
 */
export function templateFor(layout: TableLayout, kind: RowKind): TemplateLine {
  if (kind === 'header' && layout.headerTemplate) {
    return layout.headerTemplate;
  }
  return layout.template;
}
