// ═══════════════════════════════════════════════════════════════════════════════
// EXPORT MODULE — Table Slices as Text, CSV, TSV and SQL INSERT
// ═══════════════════════════════════════════════════════════════════════════════

// Types
export type {
  ExportFormat,
  CopyCommand,
  Token,
  Borrowed,
  Owned,
  FieldText,
  QuotingOptions,
  ColumnSpan,
  ExportRange,
  RowFilter,
  ExportPlan,
  ExportRequest,
  ExportStats,
  ExportResult,
  ExportErrorCode,
} from './types.js';

// Constants
export {
  EXPORT_FORMATS,
  COPY_COMMANDS,
  MIME_TYPES,
  FILE_EXTENSIONS,
  isInsertFormat,
  isDelimitedFormat,
  borrowed,
  owned,
} from './types.js';

// Errors
export {
  ExportError,
  InvalidArgumentError,
  SinkWriteError,
} from './types.js';

// Quoting
export {
  NULL_SENTINEL,
  trimField,
  csvEscape,
  quoteSqlIdentifier,
  quoteSqlLiteral,
} from './quoting.js';

// Field iterator
export {
  iterateTokens,
  coalesceFields,
  type FieldIteratorOptions,
} from './field-iterator.js';

// State machine
export {
  ExportState,
  type ExportStateInit,
} from './state-machine.js';

// Planning
export {
  computeExportPlan,
  topRowCount,
  type CursorPosition,
  type ExportView,
} from './range.js';

// Sinks
export {
  StringSink,
  FileSink,
  CountingSink,
  type ExportSink,
  type FileSinkOptions,
} from './sink.js';

// Service
export {
  ExportRequestSchema,
  prepareExport,
  runExport,
  exportData,
  ExportService,
  getExportService,
  resetExportService,
  type ExportSource,
  type ExportContext,
  type PreparedExport,
  type ExportServiceConfig,
} from './service.js';
