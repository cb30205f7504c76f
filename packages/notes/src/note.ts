import { randomUUID } from 'node:crypto';

import type { Note, NoteImage } from './types';

export function generateId(): string {
  return randomUUID();
}

function nowIso(): string {
  return new Date().toISOString();
}

function timestampOf(value: string): number {
  const time = Date.parse(value);
  return Number.isNaN(time) ? 0 : time;
}

export function createNote(title: string): Note {
  const now = nowIso();
  return {
    id: generateId(),
    title,
    content: '',
    images: [],
    tags: [],
    created_at: now,
    updated_at: now,
  };
}

/**
 * Sets `updated_at` to the current time. A clock that reads earlier than
 * `created_at` is clamped so the note never looks older than it is.
 */
export function touchNote(note: Note): void {
  const now = nowIso();
  note.updated_at =
    timestampOf(now) < timestampOf(note.created_at) ? note.created_at : now;
}

export function addTag(note: Note, tag: string): boolean {
  if (note.tags.includes(tag)) {
    return false;
  }
  note.tags.push(tag);
  touchNote(note);
  return true;
}

export function removeTag(note: Note, tag: string): boolean {
  const index = note.tags.indexOf(tag);
  if (index === -1) {
    return false;
  }
  note.tags.splice(index, 1);
  touchNote(note);
  return true;
}

export function addImage(
  note: Note,
  image: { path: string; caption?: string; altText?: string },
): NoteImage {
  const entry: NoteImage = {
    id: generateId(),
    path: image.path,
    caption: image.caption ?? '',
    alt_text: image.altText ?? '',
    position: note.images.length,
  };
  note.images.push(entry);
  touchNote(note);
  return entry;
}

export function sortByUpdatedDesc(notes: Note[]): void {
  notes.sort((a, b) => timestampOf(b.updated_at) - timestampOf(a.updated_at));
}
