// ═══════════════════════════════════════════════════════════════════════════════
// EXPORT SERVICE — Drives Selected Rows Through Iterator and State Machine
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { getExportOptions, loadConfig, type ExportOptions } from '../config/index.js';
import { loggers, type Logger } from '../logging/index.js';
import { classifyRow, templateFor } from '../table/layout.js';
import type { LineBuffer } from '../table/line-buffer.js';
import type { SearchMatcher } from '../table/search.js';
import type { RowKind, TemplateLine } from '../table/types.js';
import { err, ok, type Result } from '../types/result.js';
import { coalesceFields, iterateTokens } from './field-iterator.js';
import { quoteSqlIdentifier } from './quoting.js';
import { computeExportPlan, type ExportView } from './range.js';
import { CountingSink, FileSink, StringSink, type ExportSink, type FileSinkOptions } from './sink.js';
import { ExportState } from './state-machine.js';
import {
  COPY_COMMANDS,
  EXPORT_FORMATS,
  FILE_EXTENSIONS,
  InvalidArgumentError,
  MIME_TYPES,
  SinkWriteError,
  isInsertFormat,
  type ExportError,
  type ExportPlan,
  type ExportRequest,
  type ExportResult,
  type ExportStats,
  type Token,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION SCHEMAS
// ─────────────────────────────────────────────────────────────────────────────────

// Signs of rows and percent are checked by the planner
export const ExportRequestSchema = z.object({
  command: z.enum(COPY_COMMANDS),
  format: z.enum(EXPORT_FORMATS),
  rows: z.number().finite().optional(),
  percent: z.number().finite().optional(),
  tableName: z.string().optional(),
});

// ─────────────────────────────────────────────────────────────────────────────────
// CONTEXT
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * The table being exported and the screen state around it.
 */
export interface ExportSource {
  lines: LineBuffer;
  view: ExportView;
  /** Active search; required by copy-searched-lines */
  search?: SearchMatcher | null;
}

export interface ExportContext extends ExportSource {
  sink: ExportSink;
  options: ExportOptions;
  logger?: Logger;
}

const END_OF_ROW: Token = { role: 'end', text: '', byteLength: 0, xpos: -1 };

function printsRow(plan: ExportPlan, kind: RowKind): boolean {
  switch (kind) {
    case 'border':
      return plan.printBorder;
    case 'header-line':
      return plan.printHeaderLine;
    case 'header':
      return plan.printHeader;
    case 'footer':
      return plan.printFooter;
    case 'data':
    case 'other':
      return true;
  }
}

function isAllocationFailure(error: unknown): error is RangeError {
  return error instanceof RangeError && /invalid string length|allocation failed/i.test(error.message);
}

function exportRow(
  state: ExportState,
  text: string,
  template: TemplateLine,
  isColumnNameRow: boolean,
  force8bit: boolean
): Result<void, SinkWriteError> {
  state.beginRow();

  for (const token of coalesceFields(iterateTokens(text, template, { force8bit }))) {
    const processed = state.processItem(token, isColumnNameRow);
    if (!processed.ok) return processed;
  }

  return state.processItem(END_OF_ROW, isColumnNameRow);
}

// ─────────────────────────────────────────────────────────────────────────────────
// PREPARATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * A request that passed validation, ready to be written to a sink.
 */
export interface PreparedExport {
  readonly command: ExportRequest['command'];
  readonly plan: ExportPlan;
  /** Identifier-quoted target of INSERT statements */
  readonly tableName: string | null;
}

/**
 * Validate a request against the table and plan it. Touches no sink, so a
 * rejected request leaves every output untouched.
 */
export function prepareExport(
  request: ExportRequest,
  source: ExportSource,
  options: ExportOptions,
  logger: Logger = loggers.export()
): Result<PreparedExport, InvalidArgumentError> {
  const parsed = ExportRequestSchema.safeParse(request);
  if (!parsed.success) {
    const error = new InvalidArgumentError(
      `Invalid export request: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`
    );
    logger.warn(error.message);
    return err(error);
  }

  const planned = computeExportPlan(parsed.data, source.view, options);
  if (!planned.ok) {
    logger.warn(planned.error.message, { command: request.command });
    return err(planned.error);
  }
  const plan = planned.value;

  let tableName: string | null = null;
  if (isInsertFormat(plan.format)) {
    if (!request.tableName) {
      const error = new InvalidArgumentError('a table name is required for INSERT exports');
      logger.warn(error.message);
      return err(error);
    }
    tableName = quoteSqlIdentifier(request.tableName, options.force8bit).text;
  }

  if (plan.rowFilter === 'search-matched' && !source.search) {
    const error = new InvalidArgumentError('copy-searched-lines needs an active search');
    logger.warn(error.message);
    return err(error);
  }

  return ok({ command: parsed.data.command, plan, tableName });
}

// ─────────────────────────────────────────────────────────────────────────────────
// EXPORT
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Write a prepared export to the context's sink. Stops at the first refused
 * write, leaving what was written in place.
 */
export function runExport(
  prepared: PreparedExport,
  context: ExportContext
): Result<ExportStats, SinkWriteError> {
  const startTime = Date.now();
  const logger = context.logger ?? loggers.export();
  const { layout } = context.view;
  const { force8bit } = context.options;
  const { plan } = prepared;
  const search = context.search ?? null;

  const sink = new CountingSink(context.sink, force8bit ? 'latin1' : 'utf8');
  const state = new ExportState({
    sink,
    format: plan.format,
    columns: plan.range.columns,
    extendedLine: plan.extendedLine,
    tableName: prepared.tableName,
    columnCount: layout.columns,
    options: {
      force8bit,
      emptyStringIsNull: context.options.emptyStringIsNull,
    },
  });

  logger.debug('Export started', {
    command: prepared.command,
    format: plan.format,
    minRow: plan.range.minRow,
    maxRow: plan.range.maxRow,
    columns: plan.range.columns,
  });

  let rowsExported = 0;

  try {
    const cursor = context.lines.cursor();

    for (let mark = cursor.setMarkNext(); mark !== null; mark = cursor.setMarkNext()) {
      const line = mark.getLine();
      const kind = classifyRow(layout, line.rowNumber);

      if (kind === 'data') {
        if (line.rowNumber < plan.range.minRow || line.rowNumber > plan.range.maxRow) continue;

        if (plan.rowFilter === 'bookmarked' && !(line.info?.bookmark ?? false)) continue;

        if (plan.rowFilter === 'search-matched' && (search === null || !mark.refreshInfo(search).foundStr)) {
          continue;
        }
      } else if (!printsRow(plan, kind)) {
        continue;
      }

      const written = exportRow(
        state,
        line.text,
        templateFor(layout, kind),
        plan.saveColumnNames && kind === 'header',
        force8bit
      );

      if (!written.ok) {
        logger.error('Export aborted', written.error, {
          rowNumber: line.rowNumber,
          bytesWritten: sink.bytesWritten,
        });
        return err(written.error);
      }

      if (kind === 'data') rowsExported += 1;
    }
  } catch (error) {
    if (isAllocationFailure(error)) {
      logger.fatal('Out of memory while exporting', error);
    }
    throw error;
  } finally {
    state.dispose();
  }

  const stats: ExportStats = {
    rowsExported,
    bytesWritten: sink.bytesWritten,
    durationMs: Date.now() - startTime,
  };

  logger.time('Export finished', startTime, {
    command: prepared.command,
    format: plan.format,
    rowsExported,
    bytesWritten: stats.bytesWritten,
  });

  return ok(stats);
}

/**
 * Write the part of the table a copy command selects to the sink.
 *
 * Fails before writing anything on an invalid request.
 */
export function exportData(
  request: ExportRequest,
  context: ExportContext
): Result<ExportStats, ExportError> {
  const prepared = prepareExport(request, context, context.options, context.logger);
  if (!prepared.ok) return prepared;

  return runExport(prepared.value, context);
}

// ─────────────────────────────────────────────────────────────────────────────────
// EXPORT SERVICE
// ─────────────────────────────────────────────────────────────────────────────────

export interface ExportServiceConfig {
  options: ExportOptions;
  defaultTableName: string;
}

export class ExportService {
  private readonly config: ExportServiceConfig;
  private readonly logger: Logger;

  constructor(config?: Partial<ExportServiceConfig>, logger?: Logger) {
    this.config = {
      options: config?.options ?? getExportOptions(),
      defaultTableName: config?.defaultTableName ?? loadConfig().export.defaultTableName,
    };
    this.logger = logger ?? loggers.export();
  }

  /**
   * Export into any sink. INSERT exports without a table name fall back to
   * the configured default.
   */
  export(
    request: ExportRequest,
    source: ExportSource,
    sink: ExportSink
  ): Result<ExportStats, ExportError> {
    return exportData(this.withDefaults(request), {
      ...source,
      sink,
      options: this.config.options,
      logger: this.logger,
    });
  }

  /**
   * Export to string content.
   */
  exportToString(
    request: ExportRequest,
    source: ExportSource
  ): Result<{ content: string; result: ExportResult }, ExportError> {
    const sink = new StringSink();
    const exported = this.export(request, source, sink);
    if (!exported.ok) return exported;

    const content = sink.toString();
    return ok({ content, result: this.describe(request, exported.value) });
  }

  /**
   * Export into a file, created or truncated unless appending. The file is
   * opened only once the request is accepted.
   */
  exportToFile(
    request: ExportRequest,
    source: ExportSource,
    path: string,
    options: FileSinkOptions = {}
  ): Result<ExportResult, ExportError> {
    const prepared = prepareExport(this.withDefaults(request), source, this.config.options, this.logger);
    if (!prepared.ok) return prepared;

    let sink: FileSink;
    try {
      sink = new FileSink(path, {
        encoding: this.config.options.force8bit ? 'latin1' : 'utf8',
        ...options,
      });
    } catch (error) {
      const failure = new SinkWriteError(error);
      this.logger.error('Cannot open export file', failure, { path });
      return err(failure);
    }

    try {
      const exported = runExport(prepared.value, {
        ...source,
        sink,
        options: this.config.options,
        logger: this.logger,
      });
      if (!exported.ok) return exported;
      return ok(this.describe(request, exported.value));
    } finally {
      sink.close();
    }
  }

  private withDefaults(request: ExportRequest): ExportRequest {
    return isInsertFormat(request.format) && !request.tableName
      ? { ...request, tableName: this.config.defaultTableName }
      : request;
  }

  private describe(request: ExportRequest, stats: ExportStats): ExportResult {
    const format = request.command === 'copy-line-extended' && request.format !== 'tsv'
      ? 'csv'
      : request.format;

    return {
      format,
      mimeType: MIME_TYPES[format],
      fileExtension: FILE_EXTENSIONS[format],
      sizeBytes: stats.bytesWritten,
      stats,
    };
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// SINGLETON
// ─────────────────────────────────────────────────────────────────────────────────

let exportService: ExportService | null = null;

export function getExportService(): ExportService {
  if (!exportService) {
    exportService = new ExportService();
  }
  return exportService;
}

export function resetExportService(): void {
  exportService = null;
}
