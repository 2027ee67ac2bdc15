// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Environment Config, Export Defaults, Logging Settings
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

function envBool(key: string, defaultValue: boolean = false): boolean {
  const value = process.env[key]?.toLowerCase();
  if (value === undefined) return defaultValue;
  return value === 'true' || value === '1' || value === 'yes';
}

function envString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMA
// ─────────────────────────────────────────────────────────────────────────────────

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);

export const EngineConfigSchema = z.object({
  logging: z.object({
    level: LogLevelSchema,
    json: z.boolean(),
  }),
  export: z.object({
    force8bit: z.boolean(),
    emptyStringIsNull: z.boolean(),
    noCursor: z.boolean(),
    verticalCursor: z.boolean(),
    defaultTableName: z.string().min(1),
  }),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/**
 * Options the export orchestrator reads from the pager.
 */
export type ExportOptions = Omit<EngineConfig['export'], 'defaultTableName'>;

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

export class ConfigError extends Error {
  readonly name = 'ConfigError';
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOADING
// ─────────────────────────────────────────────────────────────────────────────────

function readEnvironment(): unknown {
  const isProduction = envString('NODE_ENV', 'development') === 'production';
  const debugMode = envBool('DEBUG', false);

  return {
    logging: {
      level: debugMode ? 'debug' : envString('LOG_LEVEL', 'info'),
      json: envBool('LOG_JSON', isProduction),
    },
    export: {
      force8bit: envBool('EXPORT_FORCE8BIT', false),
      emptyStringIsNull: envBool('EXPORT_EMPTY_STRING_IS_NULL', false),
      noCursor: envBool('EXPORT_NO_CURSOR', false),
      verticalCursor: envBool('EXPORT_VERTICAL_CURSOR', false),
      defaultTableName: envString('EXPORT_TABLE_NAME', 'mytable'),
    },
  };
}

/**
 * Validate a raw configuration object, throwing ConfigError on failure.
 */
export function validateConfig(raw: unknown): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}

let cachedConfig: EngineConfig | null = null;

export function loadConfig(): EngineConfig {
  if (cachedConfig) return cachedConfig;

  cachedConfig = validateConfig(readEnvironment());
  return cachedConfig;
}

export function reloadConfig(): EngineConfig {
  cachedConfig = null;
  return loadConfig();
}

export function getExportOptions(): ExportOptions {
  const config = loadConfig().export;
  return {
    force8bit: config.force8bit,
    emptyStringIsNull: config.emptyStringIsNull,
    noCursor: config.noCursor,
    verticalCursor: config.verticalCursor,
  };
}
