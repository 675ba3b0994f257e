/**
 * CLI configuration
 *
 * JSON config file with `${VAR}` / `${VAR:-default}` placeholders expanded
 * from the environment before validation.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { identifierSchema, primaryKeyTypeSchema } from '@schemabridge/core';
import { fieldMappingSchema, mappingOptionsSchema } from '@schemabridge/mapping';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  /** Variables to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Expand placeholders in every string of a decoded JSON document
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
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

const sourceSchema = z
  .object({
    baseUrl: z.string().url().optional(),
    endpoint: z.string().min(1),
    method: z.enum(['GET', 'POST']).default('GET'),
    query: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
    headers: z.record(z.string()).optional(),
    /** Dotted path to the record list inside the response */
    recordsPath: z.string().min(1).optional(),
    timeoutMs: z.number().int().min(1).max(300_000).optional(),
  })
  .strict();

const mappingSectionSchema = z
  .object({
    /** Options for generating a mapping from the first record */
    options: mappingOptionsSchema.optional(),
    /** Explicit mapping; takes precedence over generation */
    fields: fieldMappingSchema.optional(),
  })
  .strict();

const sslSchema = z.union([
  z.boolean(),
  z.object({ rejectUnauthorized: z.boolean().optional() }).strict(),
]);

const targetBase = z.object({
  table: identifierSchema,
  primaryKey: identifierSchema.optional(),
  primaryKeyType: primaryKeyTypeSchema.optional(),
  host: z.string().min(1).optional(),
  port: z.number().int().min(1).max(65535).optional(),
  database: z.string().min(1).optional(),
  user: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
  connectTimeoutMs: z.number().int().min(1).max(300_000).optional(),
});

const mysqlTarget = targetBase
  .extend({
    type: z.literal('mysql'),
    uri: z.string().min(1).optional(),
    ssl: z.boolean().optional(),
  })
  .strict();

const postgresTarget = targetBase
  .extend({
    type: z.literal('postgresql'),
    connectionString: z.string().min(1).optional(),
    schema: identifierSchema.optional(),
    ssl: sslSchema.optional(),
  })
  .strict();

export const targetSchema = z.discriminatedUnion('type', [mysqlTarget, postgresTarget]);

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    source: sourceSchema,
    mapping: mappingSectionSchema.default({}),
    target: targetSchema.optional(),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;
export type SourceConfig = ConfigFile['source'];
export type TargetConfig = z.infer<typeof targetSchema>;

export function formatZodError(err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `Invalid config file:\n${issues}`;
}

/**
 * Validate decoded config JSON, after placeholder expansion
 * @throws ConfigError
 */
export function parseConfig(raw: unknown, options?: EnvExpansionOptions): ConfigFile {
  const result = configFileSchema.safeParse(expandEnvVars(raw, options));
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }
  return result.data;
}

/**
 * Read and validate a config file, relative to the working directory
 * @throws ConfigError
 */
export async function loadConfig(configPath: string, options?: EnvExpansionOptions): Promise<ConfigFile> {
  const absolutePath = resolve(process.cwd(), configPath);
  const content = await readFile(absolutePath, 'utf-8');
  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (error) {
    throw new ConfigError(
      `Config file ${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseConfig(parsed, options);
}
