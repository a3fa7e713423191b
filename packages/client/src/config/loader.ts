/**
 * Config Loader - connection settings from defaults, a prefs file, the
 * environment, and explicit options, in that order of precedence.
 *
 * The merged settings are validated with zod before a client uses them.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { z } from 'zod';

import { ChronoKvError } from '../errors.js';

// ============================================================================
// Schema
// ============================================================================

export const clientConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65_535),
  username: z.string().min(1),
  password: z.string(),
  environment: z.string(),
  timeoutMs: z.number().int().positive(),
  debug: z.boolean(),
});

export type ClientConfig = z.infer<typeof clientConfigSchema>;

const partialConfigSchema = clientConfigSchema.partial().strict();

export const DEFAULT_CLIENT_CONFIG: Readonly<ClientConfig> = Object.freeze({
  host: 'localhost',
  port: 1717,
  username: 'admin',
  password: 'admin',
  environment: '',
  timeoutMs: 30_000,
  debug: false,
});

/** Environment variable prefix for config overrides */
const ENV_PREFIX = 'CHRONOKV_';

const ENV_VARS = {
  HOST: `${ENV_PREFIX}HOST`,
  PORT: `${ENV_PREFIX}PORT`,
  USERNAME: `${ENV_PREFIX}USERNAME`,
  PASSWORD: `${ENV_PREFIX}PASSWORD`,
  ENVIRONMENT: `${ENV_PREFIX}ENVIRONMENT`,
  TIMEOUT_MS: `${ENV_PREFIX}TIMEOUT_MS`,
  DEBUG: `${ENV_PREFIX}DEBUG`,
} as const;

// ============================================================================
// Errors
// ============================================================================

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigValidationError extends ChronoKvError {
  constructor(
    message: string,
    public readonly issues: readonly ConfigIssue[],
    options?: { cause?: unknown },
  ) {
    super('CONFIG_INVALID', message, options);
    this.name = 'ConfigValidationError';
  }
}

function toIssues(error: z.ZodError, source: string): ConfigIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : source,
    message: issue.message,
  }));
}

function describe(issues: readonly ConfigIssue[]): string {
  return issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
}

// ============================================================================
// Sources
// ============================================================================

function parseEnvBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {return undefined;}
  const lower = value.toLowerCase();
  if (lower === 'true' || lower === '1' || lower === 'yes') {return true;}
  if (lower === 'false' || lower === '0' || lower === 'no') {return false;}
  return undefined;
}

function parseEnvInteger(value: string | undefined): number | undefined {
  if (value === undefined) {return undefined;}
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

/** Read overrides from `CHRONOKV_*` variables. Unparsable numbers and booleans are ignored. */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): Partial<ClientConfig> {
  const overrides: Partial<ClientConfig> = {};
  const host = env[ENV_VARS.HOST];
  if (host !== undefined) overrides.host = host;
  const port = parseEnvInteger(env[ENV_VARS.PORT]);
  if (port !== undefined) overrides.port = port;
  const username = env[ENV_VARS.USERNAME];
  if (username !== undefined) overrides.username = username;
  const password = env[ENV_VARS.PASSWORD];
  if (password !== undefined) overrides.password = password;
  const environment = env[ENV_VARS.ENVIRONMENT];
  if (environment !== undefined) overrides.environment = environment;
  const timeoutMs = parseEnvInteger(env[ENV_VARS.TIMEOUT_MS]);
  if (timeoutMs !== undefined) overrides.timeoutMs = timeoutMs;
  const debug = parseEnvBoolean(env[ENV_VARS.DEBUG]);
  if (debug !== undefined) overrides.debug = debug;
  return overrides;
}

/** Read a JSON prefs file holding any subset of the connection settings. */
export async function readPrefsFile(prefsPath: string): Promise<Partial<ClientConfig>> {
  const resolved = path.resolve(prefsPath);
  let text: string;
  try {
    text = await fs.readFile(resolved, 'utf-8');
  } catch (err) {
    throw new ConfigValidationError(`Cannot read prefs file ${resolved}`, [{ path: resolved, message: 'unreadable' }], {
      cause: err,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigValidationError(`Prefs file ${resolved} is not valid JSON`, [{ path: resolved, message: 'invalid JSON' }], {
      cause: err,
    });
  }

  const result = partialConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = toIssues(result.error, resolved);
    throw new ConfigValidationError(`Invalid prefs file ${resolved}: ${describe(issues)}`, issues);
  }
  return result.data;
}

// ============================================================================
// Loader
// ============================================================================

export interface LoadClientConfigOptions extends Partial<ClientConfig> {
  /** Path to a JSON prefs file whose values override the defaults. */
  prefs?: string;
  /** Environment to read `CHRONOKV_*` overrides from. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
}

function definedOnly(options: Partial<ClientConfig>): Partial<ClientConfig> {
  const result: Partial<ClientConfig> = {};
  if (options.host !== undefined) result.host = options.host;
  if (options.port !== undefined) result.port = options.port;
  if (options.username !== undefined) result.username = options.username;
  if (options.password !== undefined) result.password = options.password;
  if (options.environment !== undefined) result.environment = options.environment;
  if (options.timeoutMs !== undefined) result.timeoutMs = options.timeoutMs;
  if (options.debug !== undefined) result.debug = options.debug;
  return result;
}

/**
 * Merge defaults, prefs file, environment and explicit options, then validate.
 */
export async function loadClientConfig(options: LoadClientConfigOptions = {}): Promise<ClientConfig> {
  const fromFile = options.prefs !== undefined ? await readPrefsFile(options.prefs) : {};
  const merged = {
    ...DEFAULT_CLIENT_CONFIG,
    ...fromFile,
    ...readEnvOverrides(options.env),
    ...definedOnly(options),
  };

  const result = clientConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = toIssues(result.error, 'config');
    throw new ConfigValidationError(`Invalid client configuration: ${describe(issues)}`, issues);
  }
  return result.data;
}
