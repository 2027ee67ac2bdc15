// ═══════════════════════════════════════════════════════════════════════════════
// QUOTING — Trimming, CSV Escaping, SQL Identifier and Literal Quoting
// ═══════════════════════════════════════════════════════════════════════════════

import { byteLength } from '../table/unicode.js';
import { borrowed, owned } from './types.js';
import type { Borrowed, FieldText, QuotingOptions } from './types.js';

/**
 * Glyph the table renderer prints for SQL NULL (U+2205, three bytes in
 * UTF-8). Not recognized in force-8-bit mode.
 */
export const NULL_SENTINEL = '∅';

const CSV_SPECIAL = /["\t\r\n,]/;
const PLAIN_IDENTIFIER = /^[a-z][a-z0-9_]*$/;
const NUMERIC_LITERAL = /^[0-9]*\.?[0-9]*$/;

function isNullSentinel(text: string, force8bit: boolean): boolean {
  return !force8bit && text === NULL_SENTINEL;
}

function wrap(text: string, quote: '"' | "'", force8bit: boolean): FieldText {
  const quoted = quote + text.split(quote).join(quote + quote) + quote;
  return owned(quoted, byteLength(quoted, force8bit));
}

// ─────────────────────────────────────────────────────────────────────────────────
// TRIM
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Strip spaces from both ends of a field. Returns null when nothing is left.
 */
export function trimField(text: string, force8bit: boolean): Borrowed | null {
  let start = 0;
  let end = text.length;

  while (start < end && text[start] === ' ') start++;
  while (end > start && text[end - 1] === ' ') end--;

  if (start === end) return null;

  const slice = start === 0 && end === text.length ? text : text.slice(start, end);
  return borrowed(slice, byteLength(slice, force8bit));
}

// ─────────────────────────────────────────────────────────────────────────────────
// CSV
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Format one CSV/TSV field. Null means the field is SQL NULL and is written
 * as nothing at all.
 */
export function csvEscape(text: string, options: QuotingOptions): FieldText | null {
  if (isNullSentinel(text, options.force8bit)) {
    return null;
  }

  if (text.length === 0) {
    return options.emptyStringIsNull ? null : owned('""', 2);
  }

  if (!CSV_SPECIAL.test(text)) {
    return borrowed(text, byteLength(text, options.force8bit));
  }

  return wrap(text, '"', options.force8bit);
}

// ─────────────────────────────────────────────────────────────────────────────────
// SQL
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Quote a table or column name unless it is a plain lowercase identifier
 * or already double-quoted.
 */
export function quoteSqlIdentifier(text: string, force8bit: boolean): FieldText {
  if (text.length === 0 || text.startsWith('"') || PLAIN_IDENTIFIER.test(text)) {
    return borrowed(text, byteLength(text, force8bit));
  }

  return wrap(text, '"', force8bit);
}

/**
 * Turn a displayed value into a SQL literal. Numbers and NULL pass bare,
 * everything else becomes a single-quoted string.
 */
export function quoteSqlLiteral(text: string, options: QuotingOptions): FieldText {
  if (text.length === 0) {
    return options.emptyStringIsNull ? owned('NULL', 4) : owned("''", 2);
  }

  if (text === 'NULL' || text === 'null') {
    return borrowed(text, 4);
  }

  if (isNullSentinel(text, options.force8bit)) {
    return owned('NULL', 4);
  }

  if (NUMERIC_LITERAL.test(text)) {
    return borrowed(text, byteLength(text, options.force8bit));
  }

  return wrap(text, "'", options.force8bit);
}
