import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Result, ok, err } from 'neverthrow';
import { parse } from 'yaml';
import { z } from 'zod';
import type { BlogApiConfig } from '../types/config.js';
import { DEFAULT_BCRYPT_ROUNDS } from '../auth/password-hasher.js';
import { DEFAULT_ACCESS_TOKEN_EXPIRE_MINUTES } from '../auth/token-service.js';

export const CONFIG_FILE_NAME = '.blog-api.yaml';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type Env = Readonly<Record<string, string | undefined>>;

// --- Zod Schemas ---

const serverConfigSchema = z.object({
  port: z.number().int('port must be an integer').min(0, 'port must be between 0 and 65535').max(65535, 'port must be between 0 and 65535'),
  corsOrigin: z.string().min(1, 'corsOrigin must not be empty'),
});

const databaseConfigSchema = z.object({
  url: z.string({ required_error: 'database url is required (set DATABASE_URL)' })
    .min(1, 'database url is required (set DATABASE_URL)'),
});

const authConfigSchema = z.object({
  secretKey: z.string({ required_error: 'secret key is required (set SECRET_KEY)' })
    .min(1, 'secret key is required (set SECRET_KEY)'),
  accessTokenExpireMinutes: z.number().int('accessTokenExpireMinutes must be an integer').positive('accessTokenExpireMinutes must be positive'),
  bcryptRounds: z.number().int('bcryptRounds must be an integer').min(4, 'bcryptRounds must be between 4 and 31').max(31, 'bcryptRounds must be between 4 and 31'),
});

const blogApiConfigSchema = z.object({
  server: serverConfigSchema,
  database: databaseConfigSchema,
  auth: authConfigSchema,
});

// --- Defaults ---

export const DEFAULT_PORT = 8000;

const DEFAULTS = {
  server: {
    port: DEFAULT_PORT,
    corsOrigin: '*',
  },
  auth: {
    accessTokenExpireMinutes: DEFAULT_ACCESS_TOKEN_EXPIRE_MINUTES,
    bcryptRounds: DEFAULT_BCRYPT_ROUNDS,
  },
} as const;

// --- Environment variable interpolation ---

const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;
const ESCAPED_ENV_VAR_PATTERN = /\\\$\{([^}]+)\}/g;

function interpolateEnvVarsInString(value: string, env: Env): string | ConfigError {
  // Park escaped \${...} so the main pattern skips them
  const placeholder = '\x00ENV_ESCAPED\x00';
  const withPlaceholders = value.replace(ESCAPED_ENV_VAR_PATTERN, `${placeholder}$1${placeholder}`);

  const missing: string[] = [];
  const resolved = withPlaceholders.replace(ENV_VAR_PATTERN, (match, varName: string) => {
    const envValue = env[varName];
    if (envValue === undefined) {
      missing.push(varName);
      return match;
    }
    return envValue;
  });

  if (missing.length > 0) {
    return new ConfigError(
      `Missing environment variable(s): ${missing.join(', ')}. Set them before starting the blog API.`,
    );
  }

  return resolved.replace(
    new RegExp(`${placeholder.replace(/\x00/g, '\\x00')}(.+?)${placeholder.replace(/\x00/g, '\\x00')}`, 'g'),
    (_match, varName: string) => `\${${varName}}`,
  );
}

export function interpolateEnvVars(obj: unknown, env: Env = process.env): unknown {
  if (typeof obj === 'string') {
    return interpolateEnvVarsInString(obj, env);
  }
  if (Array.isArray(obj)) {
    const result: unknown[] = [];
    for (const item of obj) {
      const interpolated = interpolateEnvVars(item, env);
      if (interpolated instanceof ConfigError) return interpolated;
      result.push(interpolated);
    }
    return result;
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const interpolated = interpolateEnvVars(value, env);
      if (interpolated instanceof ConfigError) return interpolated;
      result[key] = interpolated;
    }
    return result;
  }
  return obj;
}

// --- Helpers ---

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function section(partial: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = partial[key];
  return isRecord(value) ? value : {};
}

function formatZodErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Parse a numeric env var. Non-numeric values are kept as strings so that
 * schema validation reports them instead of silently using a default.
 */
function envNumber(raw: string | undefined): number | string | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : raw;
}

function withoutUndefined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, v]) => v !== undefined));
}

/**
 * Layer order, lowest first: built-in defaults, config file, environment.
 */
function mergeLayers(fromFile: Record<string, unknown>, env: Env): Record<string, unknown> {
  const envServer = withoutUndefined({
    port: envNumber(env['BLOG_API_PORT']),
    corsOrigin: env['BLOG_API_CORS_ORIGIN'],
  });
  const envDatabase = withoutUndefined({
    url: env['DATABASE_URL'],
  });
  const envAuth = withoutUndefined({
    secretKey: env['SECRET_KEY'],
    accessTokenExpireMinutes: envNumber(env['ACCESS_TOKEN_EXPIRE_MINUTES']),
    bcryptRounds: envNumber(env['BCRYPT_ROUNDS']),
  });

  return {
    server: { ...DEFAULTS.server, ...section(fromFile, 'server'), ...envServer },
    database: { ...section(fromFile, 'database'), ...envDatabase },
    auth: { ...DEFAULTS.auth, ...section(fromFile, 'auth'), ...envAuth },
  };
}

async function readConfigFile(rootDir: string, env: Env): Promise<Result<Record<string, unknown>, ConfigError>> {
  const configPath = join(rootDir, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch {
    // The file is optional; environment variables alone are enough.
    return ok({});
  }

  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    return err(new ConfigError(`Invalid YAML in config file: ${message}`));
  }

  if (parsed === null || parsed === undefined) {
    return ok({});
  }
  if (!isRecord(parsed)) {
    return err(new ConfigError('Config file is not a valid YAML object'));
  }

  const interpolated = interpolateEnvVars(parsed, env);
  if (interpolated instanceof ConfigError) {
    return err(interpolated);
  }
  return ok(isRecord(interpolated) ? interpolated : {});
}

// --- Main ---

/**
 * Load configuration for the server. The signing secret and the database URL
 * must be present; their absence is reported here so the process can refuse
 * to boot.
 */
export async function loadConfig(
  rootDir: string,
  env: Env = process.env,
): Promise<Result<BlogApiConfig, ConfigError>> {
  const fileResult = await readConfigFile(rootDir, env);
  if (fileResult.isErr()) {
    return err(fileResult.error);
  }

  const merged = mergeLayers(fileResult.value, env);

  const validationResult = blogApiConfigSchema.safeParse(merged);
  if (!validationResult.success) {
    return err(new ConfigError(`Config validation failed: ${formatZodErrors(validationResult.error)}`));
  }

  return ok(validationResult.data);
}
