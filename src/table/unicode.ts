// ═══════════════════════════════════════════════════════════════════════════════
// UNICODE PRIMITIVES — Byte Length and Terminal Display Width
// ═══════════════════════════════════════════════════════════════════════════════

import { eastAsianWidth } from 'get-east-asian-width';

// Combining marks, format characters (ZWJ, BOM, soft hyphen) and controls
const ZERO_WIDTH = /^[\p{Mn}\p{Me}\p{Cf}\p{Cc}]$/u;

/**
 * Number of bytes the UTF-8 encoding of one character takes.
 */
export function charByteLength(char: string): number {
  const cp = char.codePointAt(0);
  if (cp === undefined) return 0;
  if (cp < 0x80) return 1;
  if (cp < 0x800) return 2;
  if (cp < 0x10000) return 3;
  return 4;
}

/**
 * Number of terminal columns one character occupies (0, 1 or 2).
 */
export function charDisplayWidth(char: string): number {
  const cp = char.codePointAt(0);
  if (cp === undefined) return 0;
  if (cp >= 0x20 && cp < 0x7f) return 1;
  if (ZERO_WIDTH.test(char)) return 0;
  return eastAsianWidth(cp);
}

export function stringDisplayWidth(text: string): number {
  let width = 0;
  for (const char of text) {
    width += charDisplayWidth(char);
  }
  return width;
}

/**
 * Byte length of a string. In force-8-bit mode every UTF-16 code unit is
 * taken as one byte.
 */
export function byteLength(text: string, force8bit: boolean): number {
  return force8bit ? text.length : Buffer.byteLength(text, 'utf8');
}

/**
 * Split a string into the characters the exporter steps over: code units in
 * force-8-bit mode, code points otherwise.
 */
export function splitChars(text: string, force8bit: boolean): string[] {
  return force8bit ? text.split('') : Array.from(text);
}
