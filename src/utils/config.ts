import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors';

export const DEFAULT_ENVIRONMENT = 'dev';
export const DEFAULT_BASE_URL = 'https://httpbin.org';
export const DEFAULT_LOG_LEVEL = 'INFO';
export const DEFAULT_LOG_DIR = 'logs';
export const DEFAULT_TIMEOUT_SECONDS = 30;

export const LOG_LEVELS = ['TRACE', 'DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_ALIASES: Record<string, LogLevel> = {
  WARN: 'WARNING',
  FATAL: 'CRITICAL',
};

const optionalText = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .optional();

const settingsSchema = z.object({
  ENV: z.string().trim().min(1).default(DEFAULT_ENVIRONMENT),
  API_BASE_URL: z.url().default(DEFAULT_BASE_URL),
  API_KEY: optionalText,
  LOG_LEVEL: z
    .string()
    .trim()
    .toUpperCase()
    .transform((value) => LOG_LEVEL_ALIASES[value] ?? value)
    .pipe(z.enum(LOG_LEVELS))
    .default(DEFAULT_LOG_LEVEL),
  LOG_DIR: z.string().trim().min(1).default(DEFAULT_LOG_DIR),
});

const SETTINGS_KEYS = settingsSchema.keyof().options;
type SettingsKey = (typeof SETTINGS_KEYS)[number];

/**
 * Resolved runtime settings. Frozen on creation.
 */
export interface Settings {
  readonly environment: string;
  readonly baseUrl: string;
  readonly apiKey?: string;
  readonly logLevel: LogLevel;
  readonly logDir: string;
}

export interface SettingsSources {
  /** Environment variables. Default: `process.env`. */
  env?: NodeJS.ProcessEnv;
  /** Directory the default `.env` path is resolved against. Default: `process.cwd()`. */
  cwd?: string;
  /** Explicit `.env` path. Default: `<cwd>/.env`. */
  envFile?: string;
}

function readEnvFile(path: string): Record<string, string> {
  if (!existsSync(path)) return {};
  try {
    return parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Could not read ${path}: ${String(err)}`, { cause: err });
  }
}

/**
 * Collect recognized keys case-insensitively. Later sources win.
 */
function collect(...sources: Array<Record<string, string | undefined>>): Partial<Record<SettingsKey, string>> {
  const values: Partial<Record<SettingsKey, string>> = {};
  for (const source of sources) {
    for (const [name, value] of Object.entries(source)) {
      if (value === undefined) continue;
      const key = SETTINGS_KEYS.find((candidate) => candidate === name.toUpperCase());
      if (key) values[key] = value;
    }
  }
  return values;
}

/**
 * Resolve settings from a `.env` file and the environment. Environment variables
 * take precedence over the file.
 */
export function loadSettings(sources: SettingsSources = {}): Settings {
  const env = sources.env ?? process.env;
  const envFile = sources.envFile ?? resolve(sources.cwd ?? process.cwd(), '.env');

  const result = settingsSchema.safeParse(collect(readEnvFile(envFile), env));
  if (!result.success) {
    throw new ConfigError(`Invalid settings:\n${z.prettifyError(result.error)}`, {
      cause: result.error,
    });
  }

  const data = result.data;
  return Object.freeze({
    environment: data.ENV,
    baseUrl: data.API_BASE_URL,
    ...(data.API_KEY !== undefined ? { apiKey: data.API_KEY } : {}),
    logLevel: data.LOG_LEVEL,
    logDir: data.LOG_DIR,
  });
}

/**
 * Build a memoized settings getter: the first call loads, later calls return the
 * identical frozen object.
 */
export function createSettingsProvider(sources: SettingsSources = {}): () => Settings {
  let cached: Settings | undefined;
  return () => {
    cached ??= loadSettings(sources);
    return cached;
  };
}
