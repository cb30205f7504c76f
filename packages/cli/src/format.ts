import { buildSnippet } from '@datapad/shared';
import type { Note } from '@datapad/notes';

const PREVIEW_LENGTH = 50;

function tagSuffix(tags: readonly string[]): string {
  return tags.length > 0 ? `  [${tags.join(', ')}]` : '';
}

function preview(content: string): string {
  const flat = content.replace(/\s+/g, ' ').trim();
  return flat.length > PREVIEW_LENGTH ? `${flat.slice(0, PREVIEW_LENGTH)}...` : flat;
}

/**
 * One line per note, with an indented excerpt underneath: the search match
 * when a query is given, otherwise the start of the content.
 */
export function formatNoteList(notes: readonly Note[], query?: string): string {
  if (notes.length === 0) {
    return 'No notes found.';
  }
  const lines: string[] = [];
  for (const note of notes) {
    lines.push(`${note.id}  ${note.title}${tagSuffix(note.tags)}`);
    const excerpt = query ? buildSnippet(note.content, query) : preview(note.content);
    if (excerpt) {
      lines.push(`    ${excerpt}`);
    }
  }
  return lines.join('\n');
}

export function formatNote(note: Note): string {
  const lines = [
    `ID:       ${note.id}`,
    `Title:    ${note.title}`,
    `Tags:     ${note.tags.length > 0 ? note.tags.join(', ') : '-'}`,
    `Created:  ${note.created_at}`,
    `Updated:  ${note.updated_at}`,
  ];
  if (note.images.length > 0) {
    lines.push('Images:');
    for (const image of note.images) {
      const caption = image.caption ? ` (${image.caption})` : '';
      lines.push(`  ${image.position}. ${image.path}${caption}`);
    }
  }
  if (note.content) {
    lines.push('', note.content);
  }
  return lines.join('\n');
}

export function formatTags(tags: readonly string[]): string {
  return tags.length > 0 ? tags.join('\n') : 'No tags.';
}
