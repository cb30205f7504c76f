const DEFAULT_CONTEXT = 40;

/**
 * Case-insensitive substring test used by note search.
 * Only the empty query matches everything; whitespace is matched literally.
 */
export function containsIgnoreCase(source: string, query: string): boolean {
  if (!query) {
    return true;
  }
  return source.toLowerCase().includes(query.toLowerCase());
}

/**
 * Builds a single-line excerpt around the first case-insensitive match of `query`.
 * Returns undefined when the query does not occur in `source`.
 */
export function buildSnippet(
  source: string,
  query: string,
  context: number = DEFAULT_CONTEXT,
): string | undefined {
  const needle = query.toLowerCase();
  if (!needle) {
    return undefined;
  }
  const matchIndex = source.toLowerCase().indexOf(needle);
  if (matchIndex === -1) {
    return undefined;
  }

  const start = Math.max(0, matchIndex - context);
  const end = Math.min(source.length, matchIndex + needle.length + context);
  let snippet = source.slice(start, end).replace(/\s+/g, ' ').trim();
  if (start > 0) {
    snippet = `…${snippet}`;
  }
  if (end < source.length) {
    snippet = `${snippet}…`;
  }
  return snippet;
}
