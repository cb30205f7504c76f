import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import yaml from 'yaml';
import { z } from 'zod';

export interface DatapadConfig {
  /** Directory holding notes.json and the images/ folder. */
  storageDir: string;
  verbose: boolean;
}

export const STORAGE_ENV_VAR = 'DATAPAD_STORAGE';
export const DEBUG_ENV_VAR = 'DATAPAD_DEBUG';
export const DEFAULT_STORAGE_DIRNAME = '.datapad';

const DEFAULT_CONFIG_FILENAMES = [
  'datapad.config.json',
  'datapad.config.yaml',
  'datapad.config.yml',
];

const ConfigFileSchema = z
  .object({
    storageDir: z.string().trim().min(1).optional(),
    verbose: z.boolean().optional(),
  })
  .strict();

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  /** Value of the --storage flag, which wins over every other source. */
  storageDir?: string;
  verbose?: boolean;
}

function isTruthy(value: string | undefined): boolean {
  return value !== undefined && (value.toLowerCase() === 'true' || value === '1');
}

function expandPath(value: string, cwd: string, homeDir: string): string {
  if (value === '~') {
    return homeDir;
  }
  if (value.startsWith('~/')) {
    return path.join(homeDir, value.slice(2));
  }
  return path.resolve(cwd, value);
}

export function loadConfig(options: LoadConfigOptions = {}): DatapadConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? os.homedir();

  const fileConfig = readConfigFile(cwd);
  const verbose =
    options.verbose === true || isTruthy(env[DEBUG_ENV_VAR]) || fileConfig?.verbose === true;

  const flagDir = options.storageDir?.trim();
  if (flagDir) {
    return { storageDir: expandPath(flagDir, cwd, homeDir), verbose };
  }

  const envDir = env[STORAGE_ENV_VAR]?.trim();
  if (envDir) {
    return { storageDir: expandPath(envDir, cwd, homeDir), verbose };
  }

  if (fileConfig?.storageDir) {
    return { storageDir: expandPath(fileConfig.storageDir, cwd, homeDir), verbose };
  }

  return { storageDir: path.join(homeDir, DEFAULT_STORAGE_DIRNAME), verbose };
}

function readConfigFile(cwd: string): z.infer<typeof ConfigFileSchema> | undefined {
  const configPath = findConfigFile(cwd);
  if (!configPath) return undefined;

  let raw: unknown;
  try {
    const content = fs.readFileSync(configPath, 'utf8');
    raw = configPath.endsWith('.json') ? (JSON.parse(content) as unknown) : yaml.parse(content);
  } catch (err) {
    throw new ConfigError(`Unable to read config file ${configPath}`, { cause: err });
  }

  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigError(
      `Invalid config file ${configPath}: ${field}${issue?.message ?? 'unexpected shape'}`,
    );
  }
  return parsed.data;
}

function findConfigFile(cwd: string): string | undefined {
  for (const filename of DEFAULT_CONFIG_FILENAMES) {
    const fullPath = path.join(cwd, filename);
    if (fs.existsSync(fullPath)) {
      return fullPath;
    }
  }
  return undefined;
}
