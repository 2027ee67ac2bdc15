// ═══════════════════════════════════════════════════════════════════════════════
// QUOTING TESTS — Trim, CSV Escape, SQL Identifier and Literal Quoting
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import {
  NULL_SENTINEL,
  csvEscape,
  quoteSqlIdentifier,
  quoteSqlLiteral,
  trimField,
} from '../quoting.js';
import type { QuotingOptions } from '../types.js';

const defaults: QuotingOptions = { force8bit: false, emptyStringIsNull: false };

// ─────────────────────────────────────────────────────────────────────────────────
// TRIM
// ─────────────────────────────────────────────────────────────────────────────────

describe('trimField', () => {
  it('should strip spaces from both ends', () => {
    const trimmed = trimField('  hello, world  ', false);

    expect(trimmed).toEqual({ kind: 'borrowed', text: 'hello, world', byteLength: 12 });
  });

  it('should return null for a blank field', () => {
    expect(trimField('    ', false)).toBeNull();
    expect(trimField('', false)).toBeNull();
  });

  it('should keep tabs and inner spaces', () => {
    expect(trimField(' a\tb c ', false)?.text).toBe('a\tb c');
  });

  it('should be idempotent', () => {
    const once = trimField('  x y  ', false);
    const twice = trimField(once?.text ?? '', false);

    expect(twice).toEqual(once);
  });

  it('should count UTF-8 bytes unless force8bit', () => {
    expect(trimField(' café ', false)?.byteLength).toBe(5);
    expect(trimField(' café ', true)?.byteLength).toBe(4);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// CSV
// ─────────────────────────────────────────────────────────────────────────────────

describe('csvEscape', () => {
  it('should pass plain fields through unchanged', () => {
    const escaped = csvEscape('Alice', defaults);

    expect(escaped).toEqual({ kind: 'borrowed', text: 'Alice', byteLength: 5 });
  });

  it('should wrap a field holding a comma', () => {
    const escaped = csvEscape('hello, world', defaults);

    expect(escaped).toEqual({ kind: 'owned', text: '"hello, world"', byteLength: 14 });
  });

  it('should double embedded quotes', () => {
    const escaped = csvEscape('say "hi"', defaults);

    expect(escaped?.text).toBe('"say ""hi"""');
    // each quote grows by one character, plus the two wrapping quotes
    expect(escaped?.byteLength).toBe('say "hi"'.length + 2 + 2);
  });

  it.each(['a\tb', 'a\rb', 'a\nb'])('should wrap a field holding a control character (%j)', value => {
    expect(csvEscape(value, defaults)?.text).toBe(`"${value}"`);
  });

  it('should write an empty field as "" by default', () => {
    expect(csvEscape('', defaults)?.text).toBe('""');
  });

  it('should turn an empty field into null when empty strings are null', () => {
    expect(csvEscape('', { ...defaults, emptyStringIsNull: true })).toBeNull();
  });

  it('should turn the NULL sentinel into null', () => {
    expect(csvEscape(NULL_SENTINEL, defaults)).toBeNull();
  });

  it('should keep the sentinel as text in force8bit mode', () => {
    expect(csvEscape(NULL_SENTINEL, { ...defaults, force8bit: true })).toEqual({
      kind: 'borrowed',
      text: NULL_SENTINEL,
      byteLength: 1,
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// SQL IDENTIFIERS
// ─────────────────────────────────────────────────────────────────────────────────

describe('quoteSqlIdentifier', () => {
  it('should leave lowercase identifiers bare', () => {
    expect(quoteSqlIdentifier('order_total2', false)).toEqual({
      kind: 'borrowed',
      text: 'order_total2',
      byteLength: 12,
    });
  });

  it('should quote identifiers with spaces or capitals', () => {
    expect(quoteSqlIdentifier('Order Total', false).text).toBe('"Order Total"');
    expect(quoteSqlIdentifier('Total', false).text).toBe('"Total"');
  });

  it('should quote identifiers starting with a digit or underscore', () => {
    expect(quoteSqlIdentifier('1st', false).text).toBe('"1st"');
    expect(quoteSqlIdentifier('_id', false).text).toBe('"_id"');
  });

  it('should double embedded double quotes', () => {
    expect(quoteSqlIdentifier('a"b', false).text).toBe('"a""b"');
  });

  it('should be idempotent on quoted identifiers', () => {
    const quoted = quoteSqlIdentifier('Order Total', false);
    const again = quoteSqlIdentifier(quoted.text, false);

    expect(again.kind).toBe('borrowed');
    expect(again.text).toBe(quoted.text);
  });

  it('should leave an empty identifier alone', () => {
    expect(quoteSqlIdentifier('', false).text).toBe('');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// SQL LITERALS
// ─────────────────────────────────────────────────────────────────────────────────

describe('quoteSqlLiteral', () => {
  it('should turn the NULL sentinel into NULL', () => {
    expect(quoteSqlLiteral(NULL_SENTINEL, defaults)).toEqual({
      kind: 'owned',
      text: 'NULL',
      byteLength: 4,
    });
  });

  it('should pass NULL keywords through', () => {
    expect(quoteSqlLiteral('NULL', defaults).kind).toBe('borrowed');
    expect(quoteSqlLiteral('null', defaults).text).toBe('null');
  });

  it('should leave numbers bare', () => {
    expect(quoteSqlLiteral('42', defaults).text).toBe('42');
    expect(quoteSqlLiteral('12.50', defaults).text).toBe('12.50');
  });

  it('should leave a bare or leading/trailing decimal point unquoted', () => {
    expect(quoteSqlLiteral('.', defaults).text).toBe('.');
    expect(quoteSqlLiteral('1.', defaults).text).toBe('1.');
    expect(quoteSqlLiteral('.5', defaults).text).toBe('.5');
  });

  it('should quote values that only look numeric', () => {
    expect(quoteSqlLiteral('1.2.3', defaults).text).toBe("'1.2.3'");
    expect(quoteSqlLiteral('-5', defaults).text).toBe("'-5'");
  });

  it('should quote strings and double single quotes', () => {
    expect(quoteSqlLiteral("O'Hara", defaults)).toEqual({
      kind: 'owned',
      text: "'O''Hara'",
      byteLength: 9,
    });
  });

  it('should write empty values as an empty string or NULL', () => {
    expect(quoteSqlLiteral('', defaults).text).toBe("''");
    expect(quoteSqlLiteral('', { ...defaults, emptyStringIsNull: true }).text).toBe('NULL');
  });
});
