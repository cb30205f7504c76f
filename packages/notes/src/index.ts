export type { Logger, Note, NoteImage } from './types';
export {
  NotesError,
  StorageInitError,
  NotesLoadError,
  NoteNotFoundError,
  ImageImportError,
  NotesSaveError,
  describeError,
} from './errors';
export type { NotesErrorCode } from './errors';
export { addImage, addTag, createNote, removeTag, touchNote } from './note';
export { NOTES_FILENAME, notesFilePath, readNotesFile, serializeNotes } from './persistence';
export { parseFrontmatter, serializeFrontmatter } from './frontmatter';
export { IMAGES_DIRNAME, NotesManager } from './manager';
export type { ImportImageParams, NoteChanges, NotesManagerOptions } from './manager';
