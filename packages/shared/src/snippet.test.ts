import { describe, expect, it } from 'vitest';

import { buildSnippet, containsIgnoreCase } from './snippet';

describe('containsIgnoreCase', () => {
  it('matches regardless of case', () => {
    expect(containsIgnoreCase('Grocery List', 'grocery')).toBe(true);
    expect(containsIgnoreCase('Grocery List', 'LIST')).toBe(true);
    expect(containsIgnoreCase('Grocery List', 'milk')).toBe(false);
  });

  it('matches everything for an empty query', () => {
    expect(containsIgnoreCase('anything', '')).toBe(true);
  });

  it('treats a whitespace query as literal text', () => {
    expect(containsIgnoreCase('anything', '  ')).toBe(false);
    expect(containsIgnoreCase('two  spaces', '  ')).toBe(true);
  });
});

describe('buildSnippet', () => {
  it('returns the whole text when it fits in the context window', () => {
    expect(buildSnippet('Buy milk\nand eggs', 'MILK')).toBe('Buy milk and eggs');
  });

  it('adds ellipses when the excerpt is trimmed', () => {
    const source = `${'a'.repeat(10)} needle ${'b'.repeat(10)}`;
    expect(buildSnippet(source, 'needle', 3)).toBe('…aa needle bb…');
  });

  it('returns undefined without a match', () => {
    expect(buildSnippet('nothing here', 'milk')).toBeUndefined();
  });
});
