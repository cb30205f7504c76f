import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';

import { dedupeTags, uniqueTags } from '@datapad/shared';

import type { Note, NoteImage } from './types';

export interface FrontmatterFields {
  title?: string;
  tags?: string[];
}

/** An image line from the trailing image block of an exported note. */
export interface ImageReference {
  path: string;
  caption: string;
  altText: string;
}

export interface ParsedNoteDocument {
  metadata: FrontmatterFields;
  content: string;
  images: ImageReference[];
}

const IMAGE_BLOCK_MARKER = '\n<!-- images -->\n';
const IMAGE_LINE_PATTERN = /^!\[(.*)\]\(images\/(\S+)(?: "((?:[^"\\]|\\.)*)")?\)$/;

/**
 * Splits a Markdown document into frontmatter fields, body and the image block
 * written by serializeFrontmatter. One newline after the closing `---` and one
 * at the end of the file belong to the layout, not to the body.
 */
export function parseFrontmatter(fileContent: string): ParsedNoteDocument {
  const { metadata, body } = splitFrontmatter(fileContent);
  const { content, images } = splitImageBlock(body.replace(/\r?\n$/, ''));
  return { metadata, content, images };
}

function splitFrontmatter(fileContent: string): { metadata: FrontmatterFields; body: string } {
  const trimmed = fileContent.trimStart();
  if (!trimmed.startsWith('---')) {
    return { metadata: {}, body: fileContent };
  }

  const frontmatterMatch = /^---\r?\n([\s\S]*?)\r?\n---\r?\n?([\s\S]*)$/.exec(trimmed);
  if (!frontmatterMatch) {
    return { metadata: {}, body: fileContent };
  }

  const yamlText = frontmatterMatch[1] ?? '';
  const body = (frontmatterMatch[2] ?? '').replace(/^\r?\n/, '');
  let parsed: unknown;
  try {
    parsed = parseYaml(yamlText) ?? {};
  } catch {
    // Not YAML after all; keep the body and ignore the header.
    return { metadata: {}, body };
  }

  const meta: FrontmatterFields = {};
  if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
    const obj = parsed as { title?: unknown; tags?: unknown };

    if (typeof obj.title === 'string' && obj.title.trim()) {
      meta.title = obj.title;
    }

    if (Array.isArray(obj.tags)) {
      meta.tags = uniqueTags(obj.tags.filter((t): t is string => typeof t === 'string'));
    } else if (typeof obj.tags === 'string') {
      meta.tags = dedupeTags(obj.tags.split(','));
    }
  }

  return { metadata: meta, body };
}

function splitImageBlock(body: string): { content: string; images: ImageReference[] } {
  const markerIndex = body.lastIndexOf(IMAGE_BLOCK_MARKER);
  if (markerIndex === -1) {
    return { content: body, images: [] };
  }

  const images: ImageReference[] = [];
  for (const line of body.slice(markerIndex + IMAGE_BLOCK_MARKER.length).split('\n')) {
    const match = IMAGE_LINE_PATTERN.exec(line);
    if (!match) {
      return { content: body, images: [] };
    }
    images.push({
      altText: match[1] ?? '',
      path: match[2] ?? '',
      caption: (match[3] ?? '').replace(/\\(.)/g, '$1'),
    });
  }
  return { content: body.slice(0, markerIndex), images };
}

function singleLine(value: string): string {
  return value.replace(/\s+/g, ' ');
}

function imageReference(image: NoteImage): string {
  const caption = image.caption
    ? ` "${singleLine(image.caption).replace(/[\\"]/g, '\\$&')}"`
    : '';
  return `![${singleLine(image.alt_text)}](images/${image.path}${caption})`;
}

/** Renders a note as Markdown: YAML frontmatter, the body verbatim, then its images. */
export function serializeFrontmatter(note: Note): string {
  const frontmatter: Record<string, unknown> = {
    id: note.id,
    title: note.title,
    tags: [...note.tags],
    created: note.created_at,
    updated: note.updated_at,
  };

  const yamlText = stringifyYaml(frontmatter).trimEnd();
  let body = note.content;
  if (note.images.length > 0) {
    body += `${IMAGE_BLOCK_MARKER}${note.images.map(imageReference).join('\n')}`;
  }
  return `---\n${yamlText}\n---\n\n${body}\n`;
}
