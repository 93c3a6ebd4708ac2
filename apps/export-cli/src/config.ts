import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { DEFAULT_BASE_URL, DEFAULT_TOKEN_URL } from '@libs/datastream-client';
import { LOG_LEVELS } from './logger';

/**
 * Application Configuration
 *
 * Loaded once per process from an optional JSON file and the environment
 * (environment wins), validated with zod, and frozen.
 *
 * Environment variables:
 * - `DATASTREAM_USERNAME`, `DATASTREAM_PASSWORD` (required unless in the file)
 * - `DATASTREAM_BASE_URL`, `DATASTREAM_TOKEN_URL`
 * - `DATASTREAM_TIMEOUT_MS`
 * - `DATASTREAM_REAUTH_ON_401` (`true`/`false`)
 * - `DATASTREAM_CONFIG_FILE` (path to the JSON file)
 * - `LOG_LEVEL` (debug, info, warn, error, silent)
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const DEFAULT_TIMEOUT_MS = 30_000;

const logLevelSchema = z.enum(LOG_LEVELS);

export const fileConfigSchema = z
  .object({
    username: z.string().optional(),
    password: z.string().optional(),
    baseUrl: z.string().optional(),
    tokenUrl: z.string().optional(),
    timeoutMs: z.number().optional(),
    reauthenticateOnUnauthorized: z.boolean().optional(),
    logLevel: logLevelSchema.optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

export const appConfigSchema = z.object({
  credential: z.object({
    username: z
      .string({ required_error: 'DATASTREAM_USERNAME is required' })
      .min(1, 'DATASTREAM_USERNAME is required'),
    password: z
      .string({ required_error: 'DATASTREAM_PASSWORD is required' })
      .min(1, 'DATASTREAM_PASSWORD is required'),
  }),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  tokenUrl: z.string().url().default(DEFAULT_TOKEN_URL),
  timeoutMs: z.number().int().nonnegative().default(DEFAULT_TIMEOUT_MS),
  reauthenticateOnUnauthorized: z.boolean().default(false),
  logLevel: logLevelSchema.default('info'),
});

export type AppConfig = Readonly<z.infer<typeof appConfigSchema>>;

export type Env = Record<string, string | undefined>;

export interface LoadConfigOptions {
  env?: Env;
  /** Overrides `DATASTREAM_CONFIG_FILE`. */
  configFile?: string;
  readFile?: (path: string) => string;
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const readFile = options.readFile ?? ((path: string) => readFileSync(path, 'utf8'));
  const filePath = options.configFile ?? envValue(env, 'DATASTREAM_CONFIG_FILE');
  const fromFile: FileConfig = filePath ? readConfigFile(filePath, readFile) : {};

  const timeoutRaw = envValue(env, 'DATASTREAM_TIMEOUT_MS');
  const merged = {
    credential: {
      username: envValue(env, 'DATASTREAM_USERNAME') ?? fromFile.username,
      password: envValue(env, 'DATASTREAM_PASSWORD') ?? fromFile.password,
    },
    baseUrl: envValue(env, 'DATASTREAM_BASE_URL') ?? fromFile.baseUrl,
    tokenUrl: envValue(env, 'DATASTREAM_TOKEN_URL') ?? fromFile.tokenUrl,
    timeoutMs: timeoutRaw !== undefined ? Number(timeoutRaw) : fromFile.timeoutMs,
    reauthenticateOnUnauthorized:
      parseBoolean(envValue(env, 'DATASTREAM_REAUTH_ON_401')) ?? fromFile.reauthenticateOnUnauthorized,
    logLevel: envValue(env, 'LOG_LEVEL') ?? fromFile.logLevel,
  };

  const result = appConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
  }

  return Object.freeze({
    ...result.data,
    credential: Object.freeze({ ...result.data.credential }),
  });
}

// ============================================================================
// Process-wide state
// ============================================================================

let current: AppConfig | undefined;

/** Load the process configuration. May run once; later calls throw. */
export function initConfig(options: LoadConfigOptions = {}): AppConfig {
  if (current) {
    throw new ConfigError('Configuration is already initialised');
  }
  current = loadConfig(options);
  return current;
}

export function getConfig(): AppConfig {
  if (!current) {
    throw new ConfigError('Configuration is not initialised; call initConfig() first');
  }
  return current;
}

// ============================================================================
// Helpers
// ============================================================================

function readConfigFile(
  path: string,
  readFile: (path: string) => string,
): FileConfig {
  let text: string;
  try {
    text = readFile(path);
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${path}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch {
    throw new ConfigError(`Config file ${path} is not valid JSON`);
  }

  const result = fileConfigSchema.safeParse(decoded);
  if (!result.success) {
    throw new ConfigError(`Invalid config file ${path}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function envValue(env: Env, key: string): string | undefined {
  const value = env[key];
  return value?.trim() ? value : undefined;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  throw new ConfigError(`DATASTREAM_REAUTH_ON_401 must be true or false, got "${value}"`);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
