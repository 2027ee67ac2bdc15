// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION TESTS — Environment Loading, Validation, Export Options
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, afterEach, beforeEach } from 'vitest';
import {
  ConfigError,
  getExportOptions,
  loadConfig,
  reloadConfig,
  validateConfig,
  type EngineConfig,
} from '../index.js';

const VALID: EngineConfig = {
  logging: { level: 'info', json: false },
  export: {
    force8bit: false,
    emptyStringIsNull: false,
    noCursor: false,
    verticalCursor: false,
    defaultTableName: 'mytable',
  },
};

const originalEnv = process.env;

beforeEach(() => {
  process.env = { ...originalEnv };
});

afterEach(() => {
  process.env = originalEnv;
  reloadConfig();
});

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

describe('validateConfig', () => {
  it('should accept a complete configuration', () => {
    expect(validateConfig(VALID)).toEqual(VALID);
  });

  it('should reject an unknown log level with the failing path', () => {
    const raw = { ...VALID, logging: { level: 'verbose', json: false } };

    expect(() => validateConfig(raw)).toThrow(ConfigError);
    try {
      validateConfig(raw);
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]).toMatch(/^logging\.level: /);
      }
    }
  });

  it('should reject an empty default table name', () => {
    const raw = { ...VALID, export: { ...VALID.export, defaultTableName: '' } };

    expect(() => validateConfig(raw)).toThrow(/export\.defaultTableName/);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// LOADING
// ─────────────────────────────────────────────────────────────────────────────────

describe('loadConfig', () => {
  it('should read export settings from the environment', () => {
    process.env.EXPORT_FORCE8BIT = '1';
    process.env.EXPORT_EMPTY_STRING_IS_NULL = 'yes';
    process.env.EXPORT_TABLE_NAME = 'orders';

    const config = reloadConfig();

    expect(config.export.force8bit).toBe(true);
    expect(config.export.emptyStringIsNull).toBe(true);
    expect(config.export.noCursor).toBe(false);
    expect(config.export.defaultTableName).toBe('orders');
  });

  it('should cache until reloaded', () => {
    process.env.EXPORT_TABLE_NAME = 'first';
    const first = reloadConfig();

    process.env.EXPORT_TABLE_NAME = 'second';
    expect(loadConfig()).toBe(first);
    expect(reloadConfig().export.defaultTableName).toBe('second');
  });

  it('should switch to debug logging when DEBUG is set', () => {
    process.env.LOG_LEVEL = 'warn';
    process.env.DEBUG = 'true';

    expect(reloadConfig().logging.level).toBe('debug');
  });

  it('should default to JSON logs in production', () => {
    process.env.NODE_ENV = 'production';

    expect(reloadConfig().logging.json).toBe(true);
  });

  it('should throw ConfigError on an invalid log level', () => {
    process.env.LOG_LEVEL = 'loud';

    expect(() => reloadConfig()).toThrow(ConfigError);
  });
});

describe('getExportOptions', () => {
  it('should return the pager options without the table name', () => {
    process.env.EXPORT_VERTICAL_CURSOR = 'true';
    reloadConfig();

    expect(getExportOptions()).toEqual({
      force8bit: false,
      emptyStringIsNull: false,
      noCursor: false,
      verticalCursor: true,
    });
  });
});
