/**
 * Engine configuration (engine.config.json)
 *
 * Strings may reference environment variables as `${VAR}` or
 * `${VAR:-default}`; they are expanded before validation.
 */

import { readFileSync } from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';
import { z } from 'zod';
import { formatZodIssues, isPlainObject } from '@adshift/core';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false.
   */
  allowMissing?: boolean;
  /** Variables to read from (default: process.env) */
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options: EnvExpansionOptions): string {
  const env = options.env ?? process.env;

  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

export function expandEnvVars(value: unknown, options: EnvExpansionOptions = {}): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const campaignFixtures = z.record(z.string().min(1), z.record(z.unknown()));

const sourceBase = z.object({
  id: z.string().min(1).optional(),
  name: z.string().optional(),
  /** Campaigns served by the in-process client, keyed by campaign id */
  campaigns: campaignFixtures.optional(),
});

const facebookSource = sourceBase.extend({ type: z.literal('facebook') }).strict();
const twitterSource = sourceBase.extend({ type: z.literal('twitter') }).strict();

export const sourceEntrySchema = z.discriminatedUnion('type', [facebookSource, twitterSource]);

export type SourceEntry = z.infer<typeof sourceEntrySchema>;

export const engineConfigSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    schemaDir: z.string().min(1).optional(),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
      })
      .strict()
      .optional(),
    migration: z
      .object({
        concurrency: z.number().int().min(1).max(64).optional(),
        validateBeforeMapping: z.boolean().optional(),
        warnOnMissingFields: z.boolean().optional(),
      })
      .strict()
      .optional(),
    sources: z.array(sourceEntrySchema).optional(),
    target: z
      .object({
        type: z.literal('taboola'),
        id: z.string().min(1).optional(),
        name: z.string().optional(),
        requiredFields: z.array(z.string().min(1)).min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    const platforms = new Set<string>();
    (value.sources ?? []).forEach((entry, i) => {
      if (platforms.has(entry.type)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate source platform: ${entry.type}`,
          path: ['sources', i, 'type'],
        });
      }
      platforms.add(entry.type);
    });
  });

export type EngineConfig = z.infer<typeof engineConfigSchema>;

export function formatConfigError(err: z.ZodError, source = 'engine.config.json'): string {
  return `Invalid ${source}:\n${formatZodIssues(err)}`;
}

/**
 * Expand env references and validate a config object
 * @throws ConfigError
 */
export function parseConfig(raw: unknown, options: EnvExpansionOptions = {}): EngineConfig {
  const result = engineConfigSchema.safeParse(expandEnvVars(raw, options));
  if (!result.success) {
    throw new ConfigError(formatConfigError(result.error));
  }
  return result.data;
}

/**
 * Read and validate a config file. A relative `schemaDir` is resolved against
 * the directory of the config file.
 * @throws ConfigError
 */
export function loadConfig(configPath: string, options: EnvExpansionOptions = {}): EngineConfig {
  let text: string;
  try {
    text = readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(
      `Invalid JSON in ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = engineConfigSchema.safeParse(expandEnvVars(raw, options));
  if (!result.success) {
    throw new ConfigError(formatConfigError(result.error, configPath));
  }

  const config = result.data;
  if (config.schemaDir && !isAbsolute(config.schemaDir)) {
    return { ...config, schemaDir: resolve(dirname(configPath), config.schemaDir) };
  }
  return config;
}
