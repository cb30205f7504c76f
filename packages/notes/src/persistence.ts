import { readFile, rename, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import { NotesLoadError, NotesSaveError } from './errors';
import { generateId } from './note';
import type { Logger, Note } from './types';

export const NOTES_FILENAME = 'notes.json';

const NoteImageSchema = z.object({
  id: z.string().default(''),
  path: z.string(),
  caption: z.string().default(''),
  alt_text: z.string().default(''),
  position: z.number().int().default(0),
});

const OptionalListSchema = <T extends z.ZodTypeAny>(item: T) =>
  z
    .array(item)
    .nullish()
    .transform((value) => value ?? []);

const NoteRecordSchema = z.object({
  id: z.string(),
  title: z.string().default(''),
  content: z.string().default(''),
  images: OptionalListSchema(NoteImageSchema),
  created_at: z.string(),
  updated_at: z.string(),
  tags: OptionalListSchema(z.string()),
});

const NotesFileSchema = z.array(NoteRecordSchema);

export function notesFilePath(storageDir: string): string {
  return path.join(storageDir, NOTES_FILENAME);
}

/**
 * Reads the notes file. Returns undefined when it does not exist; any other
 * read, parse or shape problem is a NotesLoadError.
 */
export async function readNotesFile(filePath: string): Promise<Note[] | undefined> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (err) {
    const error = err as NodeJS.ErrnoException;
    if (error.code === 'ENOENT') {
      return undefined;
    }
    throw new NotesLoadError(`Unable to read ${filePath}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content) as unknown;
  } catch (err) {
    throw new NotesLoadError(`Unable to parse ${filePath}`, { cause: err });
  }

  const parsed = NotesFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new NotesLoadError(
      `Invalid notes file ${filePath}${where}: ${issue?.message ?? 'unexpected shape'}`,
    );
  }
  return parsed.data;
}

/** Field order and omission of empty lists follow the on-disk format. */
export function serializeNotes(notes: readonly Note[]): string {
  const records = notes.map((note) => ({
    id: note.id,
    title: note.title,
    content: note.content,
    ...(note.images.length > 0
      ? {
          images: note.images.map((image) => ({
            id: image.id,
            path: image.path,
            caption: image.caption,
            alt_text: image.alt_text,
            position: image.position,
          })),
        }
      : {}),
    created_at: note.created_at,
    updated_at: note.updated_at,
    ...(note.tags.length > 0 ? { tags: [...note.tags] } : {}),
  }));
  return `${JSON.stringify(records, null, 2)}\n`;
}

/**
 * Writes the file through a temporary sibling and renames it into place, so a
 * crash mid-write leaves the previous file intact.
 */
export async function writeNotesFile(
  filePath: string,
  notes: readonly Note[],
  logger?: Logger,
): Promise<void> {
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `notes.${generateId()}.tmp`);
  try {
    await writeFile(tempPath, serializeNotes(notes), 'utf8');
    await rename(tempPath, filePath);
  } catch (err) {
    try {
      await unlink(tempPath);
    } catch (cleanupErr) {
      const error = cleanupErr as NodeJS.ErrnoException;
      if (error.code !== 'ENOENT') {
        logger?.warn(`[notes] Failed to remove temporary file ${tempPath}: ${String(cleanupErr)}`);
      }
    }
    throw new NotesSaveError(`Unable to write ${filePath}`, { cause: err });
  }
}
