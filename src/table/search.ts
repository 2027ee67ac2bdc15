// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH — Line Matching for Search-Driven Exports
// ═══════════════════════════════════════════════════════════════════════════════

export interface SearchOptions {
  pattern: string;
  /** Match regardless of case */
  ignoreCase?: boolean;
  /** Match regardless of case unless the pattern holds an uppercase letter */
  ignoreLowerCase?: boolean;
}

export interface SearchMatcher {
  readonly pattern: string;
  matches(text: string): boolean;
}

function hasUpperCase(text: string): boolean {
  return text !== text.toLowerCase();
}

/**
 * Plain substring matcher. An empty pattern matches nothing.
 */
export function createSearchMatcher(options: SearchOptions): SearchMatcher {
  const foldCase =
    options.ignoreCase === true ||
    (options.ignoreLowerCase === true && !hasUpperCase(options.pattern));
  const needle = foldCase ? options.pattern.toLowerCase() : options.pattern;

  return {
    pattern: options.pattern,
    matches(text: string): boolean {
      if (needle.length === 0) return false;
      const haystack = foldCase ? text.toLowerCase() : text;
      return haystack.includes(needle);
    },
  };
}
