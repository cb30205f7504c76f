import { readFile } from 'node:fs/promises';
import path from 'node:path';

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { dedupeTags } from '@datapad/shared';
import {
  NotesError,
  NotesLoadError,
  NotesManager,
  StorageInitError,
  describeError,
} from '@datapad/notes';
import type { Logger, NotesManagerOptions } from '@datapad/notes';

import { ConfigError, loadConfig } from './config';
import { formatNote, formatNoteList, formatTags } from './format';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;
export const EXIT_CONFIG = 3;
export const EXIT_OPERATION = 4;

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface RunCliOptions {
  argv?: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  stdout?: OutputStream;
  stderr?: OutputStream;
  openManager?: (storageDir: string, options: NotesManagerOptions) => Promise<NotesManager>;
}

interface ExitError extends Error {
  exitCode: number;
}

function exitError(message: string, exitCode: number): ExitError {
  const error = new Error(message) as ExitError;
  error.exitCode = exitCode;
  return error;
}

function isExitError(error: unknown): error is ExitError {
  return (
    typeof error === 'object' && error !== null && typeof (error as ExitError).exitCode === 'number'
  );
}

function createLogger(stderr: OutputStream, verbose: boolean): Logger {
  const write = (message: string): void => {
    stderr.write(`${message}\n`);
  };
  const ignore = (): void => undefined;
  return {
    info: verbose ? write : ignore,
    warn: write,
    error: write,
    ...(verbose ? { debug: write } : {}),
  };
}

type GlobalArgs = { storage?: string | undefined; json: boolean; verbose: boolean };

/** Runs one datapad command and resolves with the process exit code. */
export async function runCli(options: RunCliOptions = {}): Promise<number> {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const cwd = options.cwd ?? process.cwd();
  const open = options.openManager ?? NotesManager.open;

  const print = (argv: GlobalArgs, value: unknown, text: () => string): void => {
    stdout.write(`${argv.json ? JSON.stringify(value, null, 2) : text()}\n`);
  };

  const withManager = async (argv: GlobalArgs): Promise<NotesManager> => {
    const config = loadConfig({
      cwd,
      ...(options.env ? { env: options.env } : {}),
      ...(options.homeDir ? { homeDir: options.homeDir } : {}),
      ...(argv.storage !== undefined ? { storageDir: argv.storage } : {}),
      verbose: argv.verbose,
    });
    return open(config.storageDir, { logger: createLogger(stderr, config.verbose) });
  };

  try {
    const parser = yargs(options.argv ?? hideBin(process.argv))
      .scriptName('datapad')
      .usage('Usage: $0 <command> [options]')
      .option('storage', {
        type: 'string',
        describe: 'Path to notes storage folder (defaults to ~/.datapad)',
      })
      .option('json', {
        type: 'boolean',
        default: false,
        describe: 'Output JSON',
      })
      .option('verbose', {
        type: 'boolean',
        default: false,
        describe: 'Log storage activity to stderr',
      })
      .exitProcess(false)
      .fail((msg: string | null, err: Error | undefined) => {
        if (err) {
          throw err;
        }
        throw exitError(msg ?? 'Invalid command usage. Run with --help for usage.', EXIT_USAGE);
      })
      .command(
        'list',
        'List all notes.',
        (y) => y,
        async (argv) => {
          const manager = await withManager(argv);
          const notes = manager.listNotes();
          print(argv, notes, () => formatNoteList(notes));
        },
      )
      .command(
        'show <id>',
        'Show a note.',
        (y) =>
          y
            .positional('id', { type: 'string', demandOption: true, describe: 'Note id' })
            .option('markdown', {
              type: 'boolean',
              default: false,
              describe: 'Print the note as Markdown with frontmatter',
            }),
        async (argv) => {
          const manager = await withManager(argv);
          if (argv.markdown) {
            const markdown = manager.exportMarkdown(argv.id);
            if (argv.json) {
              print(argv, { id: argv.id, markdown }, () => markdown);
            } else {
              stdout.write(markdown);
            }
            return;
          }
          const note = manager.getNote(argv.id);
          print(argv, note, () => formatNote(note));
        },
      )
      .command(
        'create <title>',
        'Create a note.',
        (y) =>
          y
            .positional('title', { type: 'string', demandOption: true, describe: 'Note title' })
            .option('content', { type: 'string', describe: 'Markdown content' })
            .option('tag', { type: 'string', array: true, describe: 'Tag to add (repeatable)' }),
        async (argv) => {
          const manager = await withManager(argv);
          const created = manager.createNote(argv.title, {
            ...(argv.content !== undefined ? { content: argv.content } : {}),
            tags: dedupeTags(argv.tag),
          });
          const note = await manager.updateNote(created.id);
          print(argv, note, () => `Created note ${note.id}`);
        },
      )
      .command(
        'import-md <file>',
        'Create a note from a Markdown file with optional frontmatter.',
        (y) => y.positional('file', { type: 'string', demandOption: true }),
        async (argv) => {
          const filePath = path.resolve(cwd, argv.file);
          let text: string;
          try {
            text = await readFile(filePath, 'utf8');
          } catch (err) {
            throw exitError(`Unable to read ${filePath}: ${describeError(err)}`, EXIT_OPERATION);
          }
          const manager = await withManager(argv);
          const note = await manager.importMarkdown(text, {
            fallbackTitle: path.basename(filePath, path.extname(filePath)),
          });
          print(argv, note, () => `Created note ${note.id}`);
        },
      )
      .command(
        'edit <id>',
        'Change the title or content of a note.',
        (y) =>
          y
            .positional('id', { type: 'string', demandOption: true })
            .option('title', { type: 'string', describe: 'New title' })
            .option('content', { type: 'string', describe: 'New Markdown content' })
            .option('dry-run', {
              type: 'boolean',
              default: false,
              describe: 'Show a diff of the content change without saving',
            }),
        async (argv) => {
          const manager = await withManager(argv);
          if (argv.dryRun) {
            const current = manager.getNote(argv.id);
            stdout.write(manager.previewUpdate(argv.id, argv.content ?? current.content));
            return;
          }
          const note = await manager.updateNote(argv.id, {
            ...(argv.title !== undefined ? { title: argv.title } : {}),
            ...(argv.content !== undefined ? { content: argv.content } : {}),
          });
          print(argv, note, () => `Updated note ${note.id}`);
        },
      )
      .command(
        'delete <id>',
        'Delete a note.',
        (y) => y.positional('id', { type: 'string', demandOption: true }),
        async (argv) => {
          const manager = await withManager(argv);
          await manager.deleteNote(argv.id);
          print(argv, { deleted: argv.id }, () => `Deleted note ${argv.id}`);
        },
      )
      .command(
        'tag <action> <id> <tags..>',
        'Add or remove tags on a note.',
        (y) =>
          y
            .positional('action', {
              choices: ['add', 'remove'] as const,
              demandOption: true,
            })
            .positional('id', { type: 'string', demandOption: true })
            .positional('tags', { type: 'string', array: true, demandOption: true }),
        async (argv) => {
          const manager = await withManager(argv);
          let note = manager.getNote(argv.id);
          for (const tag of dedupeTags(argv.tags)) {
            note =
              argv.action === 'add'
                ? await manager.addTag(argv.id, tag)
                : await manager.removeTag(argv.id, tag);
          }
          print(argv, note, () => `Tags: ${note.tags.length > 0 ? note.tags.join(', ') : '-'}`);
        },
      )
      .command(
        'tags',
        'List every tag in use.',
        (y) => y,
        async (argv) => {
          const manager = await withManager(argv);
          const tags = manager.getAllTags();
          print(argv, tags, () => formatTags(tags));
        },
      )
      .command(
        'search [query]',
        'Search titles and content (case-insensitive).',
        (y) => y.positional('query', { type: 'string', default: '' }),
        async (argv) => {
          const manager = await withManager(argv);
          const notes = manager.searchNotes(argv.query);
          print(argv, notes, () => formatNoteList(notes, argv.query));
        },
      )
      .command(
        'filter <tags..>',
        'List notes carrying any of the given tags.',
        (y) =>
          y
            .positional('tags', { type: 'string', array: true, demandOption: true })
            .option('all', {
              type: 'boolean',
              default: false,
              describe: 'Require every tag instead of any',
            }),
        async (argv) => {
          const manager = await withManager(argv);
          const notes = manager.filterByTags(dedupeTags(argv.tags), {
            match: argv.all ? 'all' : 'any',
          });
          print(argv, notes, () => formatNoteList(notes));
        },
      )
      .command(
        'image <id> <source>',
        'Copy an image into storage and attach it to a note.',
        (y) =>
          y
            .positional('id', { type: 'string', demandOption: true })
            .positional('source', { type: 'string', demandOption: true })
            .option('caption', { type: 'string', default: '' })
            .option('alt', { type: 'string', default: '', describe: 'Alternative text' }),
        async (argv) => {
          const manager = await withManager(argv);
          const note = await manager.importImage(argv.id, path.resolve(cwd, argv.source), {
            caption: argv.caption,
            altText: argv.alt,
          });
          const image = note.images[note.images.length - 1];
          print(argv, note, () => `Attached ${image?.path ?? 'image'} to note ${note.id}`);
        },
      )
      .demandCommand(1, 'You must specify a command')
      .strict()
      .help();

    await parser.parseAsync();
    return EXIT_OK;
  } catch (error: unknown) {
    return handleCliError(error, stderr);
  }
}

function handleCliError(error: unknown, stderr: OutputStream): number {
  const report = (message: string, exitCode: number): number => {
    stderr.write(`Error: ${message}\n`);
    return exitCode;
  };

  if (isExitError(error)) {
    return report(error.message, error.exitCode);
  }
  if (error instanceof ConfigError) {
    return report(describeError(error), EXIT_CONFIG);
  }
  if (error instanceof StorageInitError || error instanceof NotesLoadError) {
    return report(describeError(error), EXIT_FATAL);
  }
  if (error instanceof NotesError) {
    return report(describeError(error), EXIT_OPERATION);
  }
  return report(describeError(error), EXIT_FATAL);
}
