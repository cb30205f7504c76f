import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { addImage, addTag, createNote, removeTag, sortByUpdatedDesc, touchNote } from './note';

describe('note operations', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('creates an empty note with matching timestamps', () => {
    const note = createNote('Shopping');

    expect(note.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(note.title).toBe('Shopping');
    expect(note.content).toBe('');
    expect(note.tags).toEqual([]);
    expect(note.images).toEqual([]);
    expect(note.created_at).toBe('2024-01-01T00:00:00.000Z');
    expect(note.updated_at).toBe(note.created_at);
  });

  it('generates distinct ids for notes created in the same instant', () => {
    const ids = new Set(Array.from({ length: 50 }, () => createNote('x').id));
    expect(ids.size).toBe(50);
  });

  it('adds a tag once and ignores duplicates', () => {
    const note = createNote('Tags');

    vi.setSystemTime(new Date('2024-01-02T00:00:00.000Z'));
    expect(addTag(note, 'home')).toBe(true);
    expect(note.updated_at).toBe('2024-01-02T00:00:00.000Z');

    vi.setSystemTime(new Date('2024-01-03T00:00:00.000Z'));
    expect(addTag(note, 'home')).toBe(false);
    expect(note.tags).toEqual(['home']);
    expect(note.updated_at).toBe('2024-01-02T00:00:00.000Z');
  });

  it('treats tags as case-sensitive', () => {
    const note = createNote('Case');
    addTag(note, 'Home');
    addTag(note, 'home');
    expect(note.tags).toEqual(['Home', 'home']);
  });

  it('removes a present tag and leaves absent ones alone', () => {
    const note = createNote('Remove');
    addTag(note, 'a');
    addTag(note, 'b');

    vi.setSystemTime(new Date('2024-01-05T00:00:00.000Z'));
    expect(removeTag(note, 'missing')).toBe(false);
    expect(note.tags).toEqual(['a', 'b']);
    expect(note.updated_at).toBe('2024-01-01T00:00:00.000Z');

    expect(removeTag(note, 'a')).toBe(true);
    expect(note.tags).toEqual(['b']);
    expect(note.updated_at).toBe('2024-01-05T00:00:00.000Z');
  });

  it('appends images with generated ids and positions', () => {
    const note = createNote('Images');

    vi.setSystemTime(new Date('2024-01-02T00:00:00.000Z'));
    const first = addImage(note, { path: 'a.png', caption: 'cart' });
    const second = addImage(note, { path: 'b.jpg', altText: 'receipt' });

    expect(note.images).toHaveLength(2);
    expect(first).toMatchObject({ path: 'a.png', caption: 'cart', alt_text: '', position: 0 });
    expect(second).toMatchObject({ path: 'b.jpg', caption: '', alt_text: 'receipt', position: 1 });
    expect(first.id).not.toBe('');
    expect(first.id).not.toBe(second.id);
    expect(note.updated_at).toBe('2024-01-02T00:00:00.000Z');
  });

  it('never moves updated_at before created_at', () => {
    const note = createNote('Clock');

    vi.setSystemTime(new Date('2023-12-31T00:00:00.000Z'));
    touchNote(note);

    expect(note.updated_at).toBe(note.created_at);
  });

  it('sorts notes by updated_at, newest first', () => {
    const older = createNote('older');
    vi.setSystemTime(new Date('2024-02-01T00:00:00.000Z'));
    const newer = createNote('newer');
    const notes = [older, newer];

    sortByUpdatedDesc(notes);

    expect(notes.map((note) => note.title)).toEqual(['newer', 'older']);
  });
});
