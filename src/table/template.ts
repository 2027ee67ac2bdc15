// ═══════════════════════════════════════════════════════════════════════════════
// TEMPLATE LINES — Per-Column Role Maps of Rendered Rows
// ═══════════════════════════════════════════════════════════════════════════════

import type { ColumnExtent, ColumnRole, TemplateLine } from './types.js';
import { charDisplayWidth } from './unicode.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TAG STRINGS
// ─────────────────────────────────────────────────────────────────────────────────

const TAG_ROLES: Record<string, ColumnRole> = {
  d: 'data',
  I: 'separator',
  L: 'left-border',
  R: 'right-border',
  '\n': 'end',
};

/**
 * Parse a compact tag string (`d` data, `I` inner separator, `L`/`R` outer
 * borders, newline end) into a template. Parsing stops after the first end
 * tag; unknown tags are rejected.
 */
export function parseTemplate(tags: string): TemplateLine {
  const roles: ColumnRole[] = [];

  for (const tag of tags) {
    const role = TAG_ROLES[tag];
    if (role === undefined) {
      throw new Error(`Unknown template tag '${tag}'`);
    }
    roles.push(role);
    if (role === 'end') break;
  }

  return roles;
}

// ─────────────────────────────────────────────────────────────────────────────────
// HEADLINE TRANSLATION
// ─────────────────────────────────────────────────────────────────────────────────

const RULE_CHARS = new Set(['-', '─', '═', '━']);

const JUNCTION_CHARS = new Set([
  '+', '|', '│', '║', '┃',
  '├', '┼', '┤', '┝', '┿', '┥',
  '╞', '╪', '╡', '╟', '╫', '╢', '╠', '╬', '╣',
]);

/**
 * Derive a template from the line under the column names
 * (`----+------`, `+----+----+`, `├────┼────┤`, `---- -----`).
 */
export function translateHeadline(headline: string): TemplateLine {
  const chars = Array.from(headline.replace(/\s+$/, ''));
  const roles: ColumnRole[] = [];
  const last = chars.length - 1;

  chars.forEach((char, index) => {
    let role: ColumnRole;

    if (RULE_CHARS.has(char)) {
      role = 'data';
    } else if (JUNCTION_CHARS.has(char)) {
      if (index === 0) role = 'left-border';
      else if (index === last) role = 'right-border';
      else role = 'separator';
    } else if (char === ' ') {
      // border 0 style: a blank gap between two rules
      role = 'separator';
    } else {
      role = 'data';
    }

    const width = Math.max(1, charDisplayWidth(char));
    for (let i = 0; i < width; i++) {
      roles.push(role);
    }
  });

  return roles;
}

// ─────────────────────────────────────────────────────────────────────────────────
// COLUMN EXTENTS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Inclusive display spans of every run of data columns, left to right.
 */
export function columnExtents(template: TemplateLine): ColumnExtent[] {
  const extents: ColumnExtent[] = [];
  let start = -1;

  for (let x = 0; x <= template.length; x++) {
    const isData = x < template.length && template[x] === 'data';

    if (isData && start === -1) {
      start = x;
    } else if (!isData && start !== -1) {
      extents.push({ xmin: start, xmax: x - 1 });
      start = -1;
    }

    if (template[x] === 'end') break;
  }

  return extents;
}
