export type TagMatchMode = 'all' | 'any';

/**
 * Drops exact duplicates, keeping first-seen order. Tags are compared as-is:
 * `Work`, `work` and ` work` are three different tags.
 */
export function uniqueTags(tags?: readonly string[]): string[] {
  return tags ? [...new Set(tags)] : [];
}

/** Normalizes free-form tag input: trims each entry, then drops blanks and duplicates. */
export function dedupeTags(tags?: readonly string[]): string[] {
  if (!tags) {
    return [];
  }

  const seen = new Set<string>();
  const deduped: string[] = [];

  for (const rawTag of tags) {
    const tag = rawTag.trim();
    if (!tag || seen.has(tag)) {
      continue;
    }
    seen.add(tag);
    deduped.push(tag);
  }

  return deduped;
}

export function matchesTags(options: {
  valueTags?: readonly string[];
  filterTags?: readonly string[];
  tagMatch?: TagMatchMode;
}): boolean {
  const { valueTags, filterTags, tagMatch } = options;

  const required = uniqueTags(filterTags);
  if (required.length === 0) {
    return true;
  }

  const actual = valueTags ?? [];
  if (actual.length === 0) {
    return false;
  }

  if (tagMatch === 'all') {
    return required.every((tag) => actual.includes(tag));
  }

  return required.some((tag) => actual.includes(tag));
}

/** Every distinct tag across the given tag lists, sorted by code unit order. */
export function collectTags(tagLists: Iterable<readonly string[] | undefined>): string[] {
  const all = new Set<string>();
  for (const tags of tagLists) {
    if (!tags) {
      continue;
    }
    for (const tag of tags) {
      all.add(tag);
    }
  }
  return [...all].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}
