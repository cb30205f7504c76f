import { mkdir, readFile, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { createTwoFilesPatch } from 'diff';

import { collectTags, containsIgnoreCase, matchesTags, uniqueTags } from '@datapad/shared';
import type { TagMatchMode } from '@datapad/shared';

import {
  ImageImportError,
  NoteNotFoundError,
  StorageInitError,
  describeError,
} from './errors';
import { parseFrontmatter, serializeFrontmatter } from './frontmatter';
import {
  addImage,
  addTag,
  createNote,
  generateId,
  removeTag,
  sortByUpdatedDesc,
  touchNote,
} from './note';
import { notesFilePath, readNotesFile, writeNotesFile } from './persistence';
import type { Logger, Note } from './types';

export const IMAGES_DIRNAME = 'images';

export interface NotesManagerOptions {
  logger?: Logger;
}

export interface NoteChanges {
  title?: string;
  content?: string;
}

export interface ImportImageParams {
  caption?: string;
  altText?: string;
}

function cloneNote(note: Note): Note {
  return structuredClone(note);
}

/**
 * Owns the note collection and its on-disk representation. Callers only ever
 * receive copies; every change goes through a method here and is persisted
 * before the method resolves (createNote excepted).
 */
export class NotesManager {
  readonly storageDir: string;
  readonly imageDir: string;
  private readonly notesFile: string;
  private readonly logger: Logger;
  private notes: Note[] = [];
  private writeQueue: Promise<void> = Promise.resolve();

  private constructor(storageDir: string, logger: Logger) {
    this.storageDir = storageDir;
    this.imageDir = path.join(storageDir, IMAGES_DIRNAME);
    this.notesFile = notesFilePath(storageDir);
    this.logger = logger;
  }

  static async open(storageDir: string, options: NotesManagerOptions = {}): Promise<NotesManager> {
    const manager = new NotesManager(path.resolve(storageDir), options.logger ?? console);
    await manager.initialize();
    return manager;
  }

  private async initialize(): Promise<void> {
    try {
      await mkdir(this.storageDir, { recursive: true });
    } catch (err) {
      throw new StorageInitError(`Unable to create storage directory ${this.storageDir}`, {
        cause: err,
      });
    }
    try {
      await mkdir(this.imageDir, { recursive: true });
    } catch (err) {
      throw new StorageInitError(`Unable to create images directory ${this.imageDir}`, {
        cause: err,
      });
    }

    const loaded = await readNotesFile(this.notesFile);
    this.notes = loaded ?? [];
    this.logger.debug?.(
      loaded
        ? `[notes] Loaded ${loaded.length} note(s) from ${this.notesFile}`
        : `[notes] No notes file at ${this.notesFile}, starting empty`,
    );
  }

  private findNote(id: string): Note {
    const note = this.notes.find((entry) => entry.id === id);
    if (!note) {
      throw new NoteNotFoundError(id);
    }
    return note;
  }

  private async save(): Promise<void> {
    const task = async (): Promise<void> => {
      sortByUpdatedDesc(this.notes);
      await writeNotesFile(this.notesFile, this.notes, this.logger);
      this.logger.debug?.(`[notes] Saved ${this.notes.length} note(s)`);
    };
    const run = this.writeQueue.then(task);
    // The queue only orders writes; failures reach the caller through `run`.
    this.writeQueue = run.catch(() => undefined);
    await run;
  }

  get size(): number {
    return this.notes.length;
  }

  /**
   * Adds a note to the in-memory collection. It becomes durable with the next
   * persisting call (usually updateNote).
   */
  createNote(title: string, initial: { content?: string; tags?: string[] } = {}): Note {
    const note = createNote(title);
    if (initial.content !== undefined) {
      note.content = initial.content;
    }
    note.tags = uniqueTags(initial.tags);
    this.notes.push(note);
    return cloneNote(note);
  }

  getNote(id: string): Note {
    return cloneNote(this.findNote(id));
  }

  listNotes(): Note[] {
    return this.notes.map(cloneNote);
  }

  async updateNote(id: string, changes: NoteChanges = {}): Promise<Note> {
    const note = this.findNote(id);
    if (changes.title !== undefined) {
      note.title = changes.title;
    }
    if (changes.content !== undefined) {
      note.content = changes.content;
    }
    touchNote(note);
    await this.save();
    return cloneNote(note);
  }

  /** Unified diff of the note body against `content`, without changing anything. */
  previewUpdate(id: string, content: string): string {
    const note = this.findNote(id);
    const label = `${note.id}.md`;
    return createTwoFilesPatch(label, label, note.content, content);
  }

  async addTag(id: string, tag: string): Promise<Note> {
    const note = this.findNote(id);
    if (addTag(note, tag)) {
      return this.updateNote(id);
    }
    return cloneNote(note);
  }

  async removeTag(id: string, tag: string): Promise<Note> {
    const note = this.findNote(id);
    if (removeTag(note, tag)) {
      return this.updateNote(id);
    }
    return cloneNote(note);
  }

  async deleteNote(id: string): Promise<void> {
    const index = this.notes.findIndex((note) => note.id === id);
    if (index === -1) {
      throw new NoteNotFoundError(id);
    }
    this.notes.splice(index, 1);
    await this.save();
  }

  searchNotes(query: string): Note[] {
    if (!query) {
      return this.listNotes();
    }
    return this.notes
      .filter(
        (note) => containsIgnoreCase(note.title, query) || containsIgnoreCase(note.content, query),
      )
      .map(cloneNote);
  }

  filterByTags(tags: readonly string[], options: { match?: TagMatchMode } = {}): Note[] {
    if (tags.length === 0) {
      return this.listNotes();
    }
    const tagMatch = options.match ?? 'any';
    return this.notes
      .filter((note) => matchesTags({ valueTags: note.tags, filterTags: tags, tagMatch }))
      .map(cloneNote);
  }

  getAllTags(): string[] {
    return collectTags(this.notes.map((note) => note.tags));
  }

  async importImage(
    noteId: string,
    sourcePath: string,
    params: ImportImageParams = {},
  ): Promise<Note> {
    const note = this.findNote(noteId);
    const filename = await this.copyIntoImageDir(sourcePath);

    const previousUpdatedAt = note.updated_at;
    const image = addImage(note, {
      path: filename,
      ...(params.caption !== undefined ? { caption: params.caption } : {}),
      ...(params.altText !== undefined ? { altText: params.altText } : {}),
    });

    try {
      return await this.updateNote(noteId);
    } catch (err) {
      const index = note.images.findIndex((entry) => entry.id === image.id);
      if (index !== -1) {
        note.images.splice(index, 1);
      }
      note.updated_at = previousUpdatedAt;
      await this.removeImageFile(path.join(this.imageDir, filename));
      throw err;
    }
  }

  /** Copies a file into the images directory under a fresh name and returns that name. */
  private async copyIntoImageDir(sourcePath: string): Promise<string> {
    const filename = `${generateId()}${path.extname(sourcePath)}`;
    const destPath = path.join(this.imageDir, filename);

    let data: Buffer;
    try {
      data = await readFile(sourcePath);
    } catch (err) {
      throw new ImageImportError(`Unable to read source image ${sourcePath}`, { cause: err });
    }

    try {
      await writeFile(destPath, data, { flag: 'wx' });
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== 'EEXIST') {
        await this.removeImageFile(destPath);
      }
      throw new ImageImportError(`Unable to write image ${destPath}`, { cause: err });
    }
    return filename;
  }

  private async removeImageFile(filePath: string): Promise<void> {
    try {
      await unlink(filePath);
    } catch (err) {
      const error = err as NodeJS.ErrnoException;
      if (error.code !== 'ENOENT') {
        this.logger.warn(`[notes] Failed to remove image ${filePath}: ${describeError(err)}`);
      }
    }
  }

  exportMarkdown(id: string): string {
    return serializeFrontmatter(this.findNote(id));
  }

  /**
   * Creates and persists a note from a Markdown document with optional
   * `title`/`tags` frontmatter. Image lines exported by exportMarkdown are
   * attached again as fresh copies of the files in the images directory;
   * references to files that are gone are skipped with a warning.
   */
  async importMarkdown(text: string, options: { fallbackTitle: string }): Promise<Note> {
    const { metadata, content, images } = parseFrontmatter(text);
    const title = metadata.title ?? options.fallbackTitle;
    const created = this.createNote(title, {
      content,
      ...(metadata.tags ? { tags: metadata.tags } : {}),
    });
    const note = this.findNote(created.id);
    const copied: string[] = [];

    try {
      for (const reference of images) {
        const sourcePath = path.join(this.imageDir, path.basename(reference.path));
        let filename: string;
        try {
          filename = await this.copyIntoImageDir(sourcePath);
        } catch (err) {
          if (!(err instanceof ImageImportError)) {
            throw err;
          }
          this.logger.warn(`[notes] Skipping image ${reference.path}: ${describeError(err)}`);
          continue;
        }
        copied.push(filename);
        addImage(note, { path: filename, caption: reference.caption, altText: reference.altText });
      }
      return await this.updateNote(created.id);
    } catch (err) {
      this.notes = this.notes.filter((entry) => entry.id !== created.id);
      for (const filename of copied) {
        await this.removeImageFile(path.join(this.imageDir, filename));
      }
      throw err;
    }
  }
}
