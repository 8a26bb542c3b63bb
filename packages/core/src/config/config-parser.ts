import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Result, ok, err } from 'neverthrow';
import { parse } from 'yaml';
import { z } from 'zod';
import type { SiftConfig } from '../types/config.js';

export const CONFIG_FILE_NAME = '.sift.yaml';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// --- Zod Schemas ---

const searchConfigSchema = z.object({
  minScore: z.number().min(0, 'minScore must be between 0 and 1').max(1, 'minScore must be between 0 and 1'),
  maxResults: z.number().int('maxResults must be an integer').positive('maxResults must be positive'),
  contextLines: z.number().int('contextLines must be an integer').nonnegative('contextLines must not be negative'),
  qualityGate: z.number().int('qualityGate must be an integer').nonnegative('qualityGate must not be negative'),
  concurrency: z.number().int('concurrency must be an integer').positive('concurrency must be positive'),
  exclude: z.array(z.string()),
  projectScope: z.boolean(),
});

const capabilityConfigSchema = z.object({
  modelPath: z.string().min(1, 'modelPath must not be empty').optional(),
  runtimeLibraries: z.array(z.string().min(1)),
  minMemoryMb: z.number().int('minMemoryMb must be an integer').positive('minMemoryMb must be positive'),
});

const embeddingConfigSchema = z.object({
  provider: z.literal('ollama'),
  baseUrl: z.string().url('baseUrl must be a URL'),
  model: z.string().min(1, 'Embedding model must not be empty'),
  dimensions: z.number().int('Dimensions must be an integer').positive('Dimensions must be positive'),
  timeout: z.number().int('timeout must be an integer').positive('timeout must be positive'),
});

const storageConfigSchema = z.object({
  path: z.string().min(1, 'Storage path must not be empty'),
});

const loggingConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'debug']),
});

const siftConfigSchema = z.object({
  version: z.string().min(1, 'Version must not be empty'),
  search: searchConfigSchema,
  capability: capabilityConfigSchema,
  embedding: embeddingConfigSchema,
  storage: storageConfigSchema,
  logging: loggingConfigSchema,
});

// --- Defaults ---

export const DEFAULT_RUNTIME_LIBRARIES: readonly string[] = [
  'libonnxruntime.so.1.16.0',
  'libonnxruntime.so',
  '/usr/lib/libonnxruntime.so',
  '/usr/local/lib/libonnxruntime.so',
];

export const DEFAULT_CONFIG: SiftConfig = {
  version: '1',
  search: {
    minScore: 0.3,
    maxResults: 100,
    contextLines: 2,
    qualityGate: 1,
    concurrency: 8,
    exclude: [],
    projectScope: false,
  },
  capability: {
    runtimeLibraries: [...DEFAULT_RUNTIME_LIBRARIES],
    minMemoryMb: 4096,
  },
  embedding: {
    provider: 'ollama',
    baseUrl: 'http://localhost:11434',
    model: 'nomic-embed-text',
    dimensions: 768,
    timeout: 30_000,
  },
  storage: {
    path: '.sift',
  },
  logging: {
    level: 'warn',
  },
};

// --- Environment variable interpolation ---

const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;
const ESCAPED_ENV_VAR_PATTERN = /\\\$\{([^}]+)\}/g;
const ESCAPE_PLACEHOLDER = '\x00ENV_ESCAPED\x00';
const RESTORE_PATTERN = /\x00ENV_ESCAPED\x00(.+?)\x00ENV_ESCAPED\x00/g;

function interpolateEnvVarsInString(
  value: string,
  env: NodeJS.ProcessEnv,
): string | ConfigError {
  const withPlaceholders = value.replace(
    ESCAPED_ENV_VAR_PATTERN,
    `${ESCAPE_PLACEHOLDER}$1${ESCAPE_PLACEHOLDER}`,
  );

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
      `Missing environment variable(s): ${missing.join(', ')}. Set them before running sift.`,
    );
  }

  return resolved.replace(RESTORE_PATTERN, (_match, varName: string) => `\${${varName}}`);
}

/**
 * Replaces `${NAME}` in every string of a parsed YAML tree with the value of
 * the environment variable. `\${NAME}` is kept literally.
 */
export function interpolateEnvVars(
  obj: unknown,
  env: NodeJS.ProcessEnv = process.env,
): unknown {
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

export function formatZodErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

function applyDefaults(partial: Record<string, unknown>): Record<string, unknown> {
  return {
    version: partial['version'] ?? DEFAULT_CONFIG.version,
    search: { ...DEFAULT_CONFIG.search, ...section(partial, 'search') },
    capability: { ...DEFAULT_CONFIG.capability, ...section(partial, 'capability') },
    embedding: { ...DEFAULT_CONFIG.embedding, ...section(partial, 'embedding') },
    storage: { ...DEFAULT_CONFIG.storage, ...section(partial, 'storage') },
    logging: { ...DEFAULT_CONFIG.logging, ...section(partial, 'logging') },
  };
}

/**
 * Validates an already-parsed config object, filling in defaults for every
 * missing field.
 */
export function parseConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
): Result<SiftConfig, ConfigError> {
  if (!isRecord(raw)) {
    return err(new ConfigError('Config file is empty or not a valid YAML object'));
  }

  const interpolated = interpolateEnvVars(raw, env);
  if (interpolated instanceof ConfigError) {
    return err(interpolated);
  }
  if (!isRecord(interpolated)) {
    return err(new ConfigError('Config file is empty or not a valid YAML object'));
  }

  const validationResult = siftConfigSchema.safeParse(applyDefaults(interpolated));
  if (!validationResult.success) {
    return err(new ConfigError(`Config validation failed: ${formatZodErrors(validationResult.error)}`));
  }

  return ok(validationResult.data);
}

// --- Main ---

/**
 * Loads `.sift.yaml` from `rootDir`. A missing file is not an error: search
 * works without configuration, so the defaults are returned.
 */
export async function loadConfig(rootDir: string): Promise<Result<SiftConfig, ConfigError>> {
  const configPath = join(rootDir, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return ok(structuredClone(DEFAULT_CONFIG));
    }
    const message = error instanceof Error ? error.message : String(error);
    return err(new ConfigError(`Cannot read config file ${configPath}: ${message}`));
  }

  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    return err(new ConfigError(`Invalid YAML in config file: ${message}`));
  }

  return parseConfig(parsed);
}
