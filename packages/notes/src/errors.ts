export type NotesErrorCode =
  | 'storage_init_failed'
  | 'load_failed'
  | 'note_not_found'
  | 'image_import_failed'
  | 'save_failed';

export class NotesError extends Error {
  readonly code: NotesErrorCode;

  constructor(code: NotesErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NotesError';
    this.code = code;
  }
}

export class StorageInitError extends NotesError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('storage_init_failed', message, options);
    this.name = 'StorageInitError';
  }
}

export class NotesLoadError extends NotesError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('load_failed', message, options);
    this.name = 'NotesLoadError';
  }
}

export class NoteNotFoundError extends NotesError {
  readonly noteId: string;

  constructor(noteId: string) {
    super('note_not_found', `Note not found: ${noteId}`);
    this.name = 'NoteNotFoundError';
    this.noteId = noteId;
  }
}

export class ImageImportError extends NotesError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('image_import_failed', message, options);
    this.name = 'ImageImportError';
  }
}

export class NotesSaveError extends NotesError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('save_failed', message, options);
    this.name = 'NotesSaveError';
  }
}

/** Formats an error and its cause chain as a single line. */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const cause = error.cause;
  if (cause === undefined) {
    return error.message;
  }
  return `${error.message}: ${describeError(cause)}`;
}
