import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { NotesLoadError, NotesSaveError } from './errors';
import { readNotesFile, serializeNotes, writeNotesFile } from './persistence';
import type { Note } from './types';

async function createTempDir(): Promise<string> {
  const dir = path.join(
    os.tmpdir(),
    `notes-persistence-test-${Date.now()}-${Math.random().toString(16).slice(2)}`,
  );
  await fs.mkdir(dir, { recursive: true });
  return dir;
}

function makeNote(overrides: Partial<Note> = {}): Note {
  return {
    id: 'note-1',
    title: 'Title',
    content: 'Body',
    images: [],
    tags: [],
    created_at: '2024-01-01T00:00:00.000Z',
    updated_at: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('serializeNotes', () => {
  it('omits empty images and tags', () => {
    const text = serializeNotes([makeNote()]);

    expect(text).toBe(
      [
        '[',
        '  {',
        '    "id": "note-1",',
        '    "title": "Title",',
        '    "content": "Body",',
        '    "created_at": "2024-01-01T00:00:00.000Z",',
        '    "updated_at": "2024-01-01T00:00:00.000Z"',
        '  }',
        ']',
        '',
      ].join('\n'),
    );
  });

  it('writes image records with snake_case fields', () => {
    const note = makeNote({
      images: [{ id: 'img', path: 'img.png', caption: 'c', alt_text: 'a', position: 0 }],
      tags: ['x'],
    });

    const [record] = JSON.parse(serializeNotes([note])) as Array<Record<string, unknown>>;

    expect(Object.keys(record ?? {})).toEqual([
      'id',
      'title',
      'content',
      'images',
      'created_at',
      'updated_at',
      'tags',
    ]);
    expect(record?.['images']).toEqual([
      { id: 'img', path: 'img.png', caption: 'c', alt_text: 'a', position: 0 },
    ]);
  });
});

describe('readNotesFile', () => {
  it('returns undefined when the file does not exist', async () => {
    const dir = await createTempDir();
    await expect(readNotesFile(path.join(dir, 'notes.json'))).resolves.toBeUndefined();
  });

  it('fills in missing lists and image fields', async () => {
    const dir = await createTempDir();
    const filePath = path.join(dir, 'notes.json');
    await fs.writeFile(
      filePath,
      JSON.stringify([
        {
          id: 'a',
          title: 'Legacy',
          content: '',
          images: [{ path: 'old.png' }],
          created_at: '2024-01-01T00:00:00Z',
          updated_at: '2024-01-01T00:00:00Z',
          tags: null,
        },
      ]),
      'utf8',
    );

    const notes = await readNotesFile(filePath);

    expect(notes).toEqual([
      {
        id: 'a',
        title: 'Legacy',
        content: '',
        images: [{ id: '', path: 'old.png', caption: '', alt_text: '', position: 0 }],
        created_at: '2024-01-01T00:00:00Z',
        updated_at: '2024-01-01T00:00:00Z',
        tags: [],
      },
    ]);
  });

  it('keeps duplicate tags as stored', async () => {
    const dir = await createTempDir();
    const filePath = path.join(dir, 'notes.json');
    await fs.writeFile(filePath, serializeNotes([makeNote({ tags: ['x', 'x'] })]), 'utf8');

    const notes = await readNotesFile(filePath);

    expect(notes?.[0]?.tags).toEqual(['x', 'x']);
  });

  it('rejects invalid JSON', async () => {
    const dir = await createTempDir();
    const filePath = path.join(dir, 'notes.json');
    await fs.writeFile(filePath, '{ not json', 'utf8');

    await expect(readNotesFile(filePath)).rejects.toBeInstanceOf(NotesLoadError);
  });

  it('rejects records with the wrong shape', async () => {
    const dir = await createTempDir();
    const filePath = path.join(dir, 'notes.json');
    await fs.writeFile(filePath, JSON.stringify([{ title: 'no id' }]), 'utf8');

    await expect(readNotesFile(filePath)).rejects.toThrow(/Invalid notes file .* at 0\.id/);
  });
});

describe('writeNotesFile', () => {
  it('replaces the file and leaves no temporary files', async () => {
    const dir = await createTempDir();
    const filePath = path.join(dir, 'notes.json');
    await fs.writeFile(filePath, 'old contents', 'utf8');

    await writeNotesFile(filePath, [makeNote()]);

    expect(await fs.readFile(filePath, 'utf8')).toBe(serializeNotes([makeNote()]));
    expect(await fs.readdir(dir)).toEqual(['notes.json']);
  });

  it('raises NotesSaveError when the directory is missing', async () => {
    const dir = await createTempDir();
    const filePath = path.join(dir, 'missing', 'notes.json');

    await expect(writeNotesFile(filePath, [makeNote()])).rejects.toBeInstanceOf(NotesSaveError);
  });
});
