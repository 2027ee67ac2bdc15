// ═══════════════════════════════════════════════════════════════════════════════
// FIELD ITERATOR — Walks a Row Against Its Template
// ═══════════════════════════════════════════════════════════════════════════════

import type { TemplateLine } from '../table/types.js';
import { charByteLength, charDisplayWidth, splitChars } from '../table/unicode.js';
import type { Token } from './types.js';

export interface FieldIteratorOptions {
  force8bit: boolean;
}

/**
 * Yield one token per character of the row, tagged with the template role of
 * the display column it starts at. Stops at the end of the row, the end of
 * the template or an `end` role, whichever comes first.
 */
export function* iterateTokens(
  row: string | null,
  template: TemplateLine | null,
  options: FieldIteratorOptions
): Generator<Token, void, undefined> {
  if (row === null || template === null) return;

  let xpos = 0;

  for (const char of splitChars(row, options.force8bit)) {
    const role = template[xpos];
    if (role === undefined || role === 'end') return;

    const size = options.force8bit ? 1 : charByteLength(char);
    const width = options.force8bit ? 1 : charDisplayWidth(char);

    yield { role, text: char, byteLength: size, xpos };

    xpos += width;
  }
}

/**
 * Merge runs of data tokens into one token per field. The merged token
 * carries the x position of the field's last character.
 */
export function* coalesceFields(tokens: Iterable<Token>): Generator<Token, void, undefined> {
  let parts: string[] = [];
  let size = 0;
  let xpos = -1;

  for (const token of tokens) {
    if (token.role === 'data') {
      parts.push(token.text);
      size += token.byteLength;
      xpos = token.xpos;
      continue;
    }

    if (parts.length > 0) {
      yield { role: 'data', text: parts.join(''), byteLength: size, xpos };
      parts = [];
      size = 0;
      xpos = -1;
    }

    yield token;
  }

  if (parts.length > 0) {
    yield { role: 'data', text: parts.join(''), byteLength: size, xpos };
  }
}
