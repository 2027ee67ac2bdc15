// ═══════════════════════════════════════════════════════════════════════════════
// TABLE MODULE — Rendered Table Model Consumed by the Exporter
// ═══════════════════════════════════════════════════════════════════════════════

// Types
export type {
  ColumnRole,
  TemplateLine,
  ColumnExtent,
  TableLayout,
  RowKind,
  LineInfo,
  Line,
  Span,
  ScreenSelection,
} from './types.js';

export { NO_SELECTION } from './types.js';

// Templates
export {
  parseTemplate,
  translateHeadline,
  columnExtents,
} from './template.js';

// Layout
export {
  describeTable,
  classifyRow,
  templateFor,
  isRuleLine,
} from './layout.js';

// Lines
export {
  LineBuffer,
  LineCursor,
  LineMark,
} from './line-buffer.js';

// Search
export {
  createSearchMatcher,
  type SearchMatcher,
  type SearchOptions,
} from './search.js';

// Unicode
export {
  charByteLength,
  charDisplayWidth,
  stringDisplayWidth,
  byteLength,
  splitChars,
} from './unicode.js';
