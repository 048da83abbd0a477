/**
 * Client configuration.
 *
 * Layers, lowest first: built-in defaults, an optional JSON file, then the
 * process environment. String values in the merged object may reference
 * environment variables as `${NAME}`; unset variables resolve to ''.
 */

import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError } from '@sluice/core';
import type { IObserver } from '@sluice/core';
import { createObserver } from '@sluice/observability';

import { BedrockClient } from './bedrock.js';
import { FetchInvoker } from './invoker.js';
import { DEFAULT_MODELS } from './params.js';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const penaltySchema = z.object({
  scale: z.number(),
  apply_to_whitespaces: z.boolean(),
  apply_to_punctuations: z.boolean(),
  apply_to_numbers: z.boolean(),
  apply_to_stopwords: z.boolean(),
  apply_to_emojis: z.boolean(),
});

const defaultOptionsSchema = z
  .object({
    max_tokens_to_sample: z.number().int().positive(),
    temperature: z.number().min(0),
    top_k: z.number().int().nonnegative(),
    top_p: z.number().min(0).max(1),
    stop_sequences: z.array(z.string()),
    anthropic_version: z.string().min(1),
    return_likelihoods: z.string(),
    count_penalty: penaltySchema,
    presence_penalty: penaltySchema,
    frequency_penalty: penaltySchema,
  })
  .partial()
  .strict();

const configSchema = z.object({
  region: z.string().min(1, 'region is required'),
  credentials: z.object({
    accessKeyId: z.string(),
    secretAccessKey: z.string(),
    sessionToken: z.string().optional(),
  }),
  models: z.object({
    completionModel: z.string().min(1),
    chatModel: z.string().min(1),
    embeddingModel: z.string().min(1),
  }),
  defaultOptions: defaultOptionsSchema,
  observers: z.array(z.string()),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  baseUrl: z.string().url().optional(),
});

export type SluiceConfig = z.infer<typeof configSchema>;

export interface LoadConfigOptions {
  /** Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
  /** JSON file merged over the defaults. Must exist when given. */
  configPath?: string;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export function getDefaultConfig(): SluiceConfig {
  return {
    region: 'us-east-1',
    credentials: {
      accessKeyId: '${AWS_ACCESS_KEY_ID}',
      secretAccessKey: '${AWS_SECRET_ACCESS_KEY}',
      sessionToken: '${AWS_SESSION_TOKEN}',
    },
    models: { ...DEFAULT_MODELS },
    defaultOptions: {},
    observers: ['console'],
    logLevel: 'info',
  };
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export function loadConfig(options: LoadConfigOptions = {}): SluiceConfig {
  const env = options.env ?? process.env;

  let merged: Record<string, unknown> = { ...getDefaultConfig() };
  if (options.configPath !== undefined) {
    merged = deepMerge(merged, readConfigFile(options.configPath));
  }

  const resolved = resolveEnvVars(merged, env);
  const layered = isRecord(resolved) ? deepMerge(resolved, envOverrides(env)) : resolved;

  const parsed = configSchema.safeParse(layered);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}

/** Wire a FetchInvoker, an observer and a BedrockClient from a loaded config. */
export function createClientFromConfig(
  config: SluiceConfig,
  observer: IObserver = createObserver({ observers: config.observers, logLevel: config.logLevel }),
): BedrockClient {
  const invoker = new FetchInvoker({
    region: config.region,
    accessKeyId: config.credentials.accessKeyId,
    secretAccessKey: config.credentials.secretAccessKey,
    sessionToken: config.credentials.sessionToken || undefined,
    baseUrl: config.baseUrl,
  });

  return new BedrockClient({
    invoker,
    observer,
    completionModel: config.models.completionModel,
    chatModel: config.models.chatModel,
    embeddingModel: config.models.embeddingModel,
    defaultOptions: config.defaultOptions,
  });
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readConfigFile(path: string): Record<string, unknown> {
  if (!existsSync(path)) {
    throw new ConfigError(`Config file not found: ${path}`, { path });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Failed to parse config file ${path}`, {
      path,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${path} must hold a JSON object`, { path });
  }
  return parsed;
}

/** Plain objects merge key by key; arrays and scalars from `override` replace. */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = result[key];
    result[key] = isRecord(current) && isRecord(value) ? deepMerge(current, value) : value;
  }
  return result;
}

/** Replace `${NAME}` references in every string of a JSON-like value. */
export function resolveEnvVars(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_, name: string) => env[name] ?? '');
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvVars(item, env));
  }
  if (isRecord(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = resolveEnvVars(item, env);
    }
    return result;
  }
  return value;
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const models: Record<string, unknown> = {};

  const region = env['AWS_REGION'] || env['AWS_DEFAULT_REGION'];
  if (region) overrides['region'] = region;

  const credentials: Record<string, unknown> = {};
  if (env['AWS_ACCESS_KEY_ID']) credentials['accessKeyId'] = env['AWS_ACCESS_KEY_ID'];
  if (env['AWS_SECRET_ACCESS_KEY']) credentials['secretAccessKey'] = env['AWS_SECRET_ACCESS_KEY'];
  if (env['AWS_SESSION_TOKEN']) credentials['sessionToken'] = env['AWS_SESSION_TOKEN'];
  if (Object.keys(credentials).length > 0) overrides['credentials'] = credentials;

  if (env['SLUICE_COMPLETION_MODEL']) models['completionModel'] = env['SLUICE_COMPLETION_MODEL'];
  if (env['SLUICE_CHAT_MODEL']) models['chatModel'] = env['SLUICE_CHAT_MODEL'];
  if (env['SLUICE_EMBEDDING_MODEL']) models['embeddingModel'] = env['SLUICE_EMBEDDING_MODEL'];
  if (Object.keys(models).length > 0) overrides['models'] = models;

  if (env['SLUICE_LOG_LEVEL']) overrides['logLevel'] = env['SLUICE_LOG_LEVEL'];
  if (env['SLUICE_BASE_URL']) overrides['baseUrl'] = env['SLUICE_BASE_URL'];

  return overrides;
}
