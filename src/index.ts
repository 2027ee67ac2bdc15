// ═══════════════════════════════════════════════════════════════════════════════
// TABULAR EXPORT — Public Entry Point
// ═══════════════════════════════════════════════════════════════════════════════

export * from './export/index.js';
export * from './table/index.js';

export {
  loadConfig,
  reloadConfig,
  validateConfig,
  getExportOptions,
  ConfigError,
  type EngineConfig,
  type ExportOptions,
} from './config/index.js';

export {
  Logger,
  getLogger,
  resetLogger,
  loggers,
  type LogLevel,
  type LogContext,
} from './logging/index.js';

export {
  ok,
  err,
  okVoid,
  type Result,
  type Ok,
  type Err,
} from './types/result.js';
