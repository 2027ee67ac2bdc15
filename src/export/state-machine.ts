// ═══════════════════════════════════════════════════════════════════════════════
// EXPORT STATE MACHINE — Turns Row Tokens into Formatted Output
// ═══════════════════════════════════════════════════════════════════════════════

import { stringDisplayWidth } from '../table/unicode.js';
import { err, okVoid, type Result } from '../types/result.js';
import { csvEscape, quoteSqlIdentifier, quoteSqlLiteral, trimField } from './quoting.js';
import type { ExportSink } from './sink.js';
import {
  SinkWriteError,
  type ColumnSpan,
  type ExportFormat,
  type QuotingOptions,
  type Token,
} from './types.js';

// Width of "INSERT INTO " plus the opening parenthesis
const INSERT_HEAD_INDENT = 13;
const VALUES_INDENT = ' '.repeat(10);

export interface ExportStateInit {
  sink: ExportSink;
  format: ExportFormat;
  /** Display columns to keep; null keeps all */
  columns: ColumnSpan | null;
  extendedLine: boolean;
  /** Already identifier-quoted target table of INSERT statements */
  tableName: string | null;
  /** Number of table columns, the capacity of the column-name map */
  columnCount: number;
  options: QuotingOptions;
}

/**
 * Context of one export call. Tokens of a row are fed through processItem()
 * in order, each row opened by beginRow() and closed by an `end` token.
 */
export class ExportState {
  private readonly sink: ExportSink;
  private readonly format: ExportFormat;
  private readonly columns: ColumnSpan | null;
  private readonly extendedLine: boolean;
  private readonly tableName: string | null;
  private readonly columnCount: number;
  private readonly options: QuotingOptions;

  private colno = 0;
  private colnames: string[] | null = null;

  constructor(init: ExportStateInit) {
    this.sink = init.sink;
    this.format = init.format;
    this.columns = init.columns;
    this.extendedLine = init.extendedLine;
    this.tableName = init.tableName;
    this.columnCount = init.columnCount;
    this.options = init.options;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────────────────────

  beginRow(): void {
    this.colno = 0;
  }

  /**
   * Release captured column names. Safe to call more than once.
   */
  dispose(): void {
    this.colnames = null;
    this.colno = 0;
  }

  get columnIndex(): number {
    return this.colno;
  }

  /**
   * Column names captured so far, up to the first index never captured.
   */
  get columnNames(): readonly string[] {
    const names: string[] = [];
    if (!this.colnames) return names;

    for (let i = 0; i < this.columnCount; i++) {
      const name = this.colnames[i];
      if (name === undefined) break;
      names.push(name);
    }
    return names;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // TRANSITIONS
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Handle one token: a single decoration character, a whole data field or
   * the row's `end`. Column-name rows feed the name map of INSERT and
   * extended-line exports instead of producing output.
   */
  processItem(token: Token, isColumnNameRow: boolean): Result<void, SinkWriteError> {
    switch (this.format) {
      case 'insert':
      case 'insert-commented':
        return this.processInsertItem(token, isColumnNameRow);
      case 'text':
        return this.processTextItem(token);
      case 'csv':
      case 'tsv':
        return this.processDelimitedItem(token, isColumnNameRow);
    }
  }

  private processInsertItem(token: Token, isColumnNameRow: boolean): Result<void, SinkWriteError> {
    const commented = this.format === 'insert-commented';

    if (token.role === 'end') {
      // a row whose values were all outside the range opened no statement
      if (isColumnNameRow || this.colno === 0) return okVoid();

      return this.write(
        commented ? `);\t\t -- ${this.colno}. ${this.nameAt(this.colno - 1)}\n` : ');\n'
      );
    }

    if (token.role !== 'data' || !this.inRange(token.xpos)) {
      return okVoid();
    }

    const trimmed = trimField(token.text, this.options.force8bit);

    if (isColumnNameRow) {
      this.captureName(quoteSqlIdentifier(trimmed?.text ?? '', this.options.force8bit).text);
      return okVoid();
    }

    let chunk = '';

    if (this.colno === 0) {
      chunk += commented ? this.commentedInsertHead() : this.insertHead();
    } else if (commented) {
      chunk += `,\t\t -- ${this.colno}. ${this.nameAt(this.colno - 1)}\n${VALUES_INDENT}`;
    } else {
      chunk += ', ';
    }

    chunk += quoteSqlLiteral(trimmed?.text ?? '', this.options).text;
    this.colno += 1;

    return this.write(chunk);
  }

  private processTextItem(token: Token): Result<void, SinkWriteError> {
    if (token.role === 'end') {
      return this.write('\n');
    }

    if ((token.role === 'data' || token.role === 'separator') && !this.inRange(token.xpos)) {
      return okVoid();
    }

    return this.write(token.text);
  }

  private processDelimitedItem(token: Token, isColumnNameRow: boolean): Result<void, SinkWriteError> {
    if (token.role === 'end') {
      return this.extendedLine ? okVoid() : this.write('\n');
    }

    if (token.role !== 'data' || !this.inRange(token.xpos)) {
      return okVoid();
    }

    const trimmed = trimField(token.text, this.options.force8bit);
    const value = csvEscape(trimmed?.text ?? '', this.options);

    if (this.extendedLine && isColumnNameRow) {
      this.captureName(value?.text ?? '');
      return okVoid();
    }

    let chunk: string;

    if (this.extendedLine) {
      chunk = `${this.nameAt(this.colno)},${value?.text ?? ''}\n`;
    } else {
      const separator = this.colno > 0 ? (this.format === 'tsv' ? '\t' : ',') : '';
      chunk = separator + (value?.text ?? '');
    }

    this.colno += 1;
    return this.write(chunk);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // HELPERS
  // ─────────────────────────────────────────────────────────────────────────────

  private inRange(xpos: number): boolean {
    return this.columns === null || (xpos >= this.columns.first && xpos <= this.columns.last);
  }

  private captureName(name: string): void {
    if (!this.colnames) {
      this.colnames = [];
    }
    if (this.colno < this.columnCount) {
      this.colnames[this.colno] = name;
    }
    this.colno += 1;
  }

  private nameAt(index: number): string {
    return this.colnames?.[index] ?? '';
  }

  private insertHead(): string {
    let head = `INSERT INTO ${this.tableName ?? ''}`;

    if (this.colnames) {
      head += `(${this.columnNames.join(', ')})`;
    }

    return `${head} VALUES(`;
  }

  private commentedInsertHead(): string {
    const table = this.tableName ?? '';
    let head = `INSERT INTO ${table}`;

    if (this.colnames) {
      const names = this.columnNames;
      const tableWidth = this.options.force8bit ? table.length : stringDisplayWidth(table);
      const indent = ' '.repeat(tableWidth + INSERT_HEAD_INDENT);

      head += '(';
      names.forEach((name, i) => {
        if (i > 0) head += indent;
        head += name;
        head += i < names.length - 1 ? `,\t\t -- ${i + 1}.\n` : `)\t\t -- ${i + 1}.\n`;
      });
    }

    return `${head}   VALUES(`;
  }

  private write(chunk: string): Result<void, SinkWriteError> {
    try {
      this.sink.write(chunk);
      return okVoid();
    } catch (error) {
      return err(new SinkWriteError(error));
    }
  }
}
