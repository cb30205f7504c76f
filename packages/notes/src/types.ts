export interface NoteImage {
  id: string;
  path: string; // filename inside the images directory
  caption: string;
  alt_text: string;
  position: number;
}

export interface Note {
  id: string;
  title: string;
  content: string; // Markdown
  images: NoteImage[];
  tags: string[];
  created_at: string; // ISO 8601
  updated_at: string; // ISO 8601
}

export type Logger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug?: (message: string) => void;
};
