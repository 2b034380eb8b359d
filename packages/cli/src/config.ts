/**
 * Configuration
 *
 * Connection settings come from environment variables, optionally
 * overridden by a JSON config file. They are resolved once at start-up
 * and passed to the store and the reconciler from there.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '@testsync/core';
import { LOG_LEVELS } from './logger.js';

export type Env = Record<string, string | undefined>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

function expandEnvInString(input: string, env: Env): string {
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    throw new ConfigurationError({
      message: `Missing required environment variable: ${name}`,
      suggestion: `Set ${name} or give the placeholder a default with \${${name}:-value}.`,
    });
  });
}

/**
 * Replace `${VAR}` and `${VAR:-default}` in every string of a JSON value
 */
export function expandEnvVars(value: unknown, env: Env): unknown {
  if (typeof value === 'string') return expandEnvInString(value, env);
  if (Array.isArray(value)) return value.map((v) => expandEnvVars(v, env));
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, env);
    }
    return out;
  }
  return value;
}

const logLevelSchema = z.enum(LOG_LEVELS);
const logFormatSchema = z.enum(['text', 'json']);

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    azure: z
      .object({
        pat: z.string().min(1).optional(),
        organizationUrl: z.string().min(1).optional(),
        project: z.string().min(1).optional(),
        apiVersion: z.string().min(1).optional(),
        timeoutMs: z.number().int().optional(),
        retryAttempts: z.number().int().optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: logLevelSchema.optional(),
        format: logFormatSchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

const integerFromEnv = z.union([z.number(), z.string().regex(/^\d+$/, 'Expected a whole number')]).pipe(
  z.coerce.number().int()
);

export const syncConfigSchema = z.object({
  azure: z.object({
    personalAccessToken: z.string().min(1),
    organizationUrl: z.string().url(),
    project: z.string().min(1),
    apiVersion: z.string().min(1).default('7.1'),
    timeoutMs: integerFromEnv.pipe(z.number().min(1).max(300_000)).default(30_000),
    retryAttempts: integerFromEnv.pipe(z.number().min(1).max(10)).default(1),
  }),
  logging: z.object({
    level: logLevelSchema.default('info'),
    format: logFormatSchema.default('text'),
  }),
});

export type SyncConfig = z.infer<typeof syncConfigSchema>;

/** Settings before validation; file values win over the environment */
export interface ConfigSettings {
  personalAccessToken?: string;
  organizationUrl?: string;
  project?: string;
  apiVersion?: string;
  timeoutMs?: number | string;
  retryAttempts?: number | string;
  logLevel?: string;
  logFormat?: string;
}

const REQUIRED_SETTINGS = [
  { key: 'personalAccessToken', env: 'AZURE_DEVOPS_PAT' },
  { key: 'organizationUrl', env: 'AZURE_DEVOPS_ORG' },
  { key: 'project', env: 'AZURE_DEVOPS_PROJECT' },
] as const satisfies readonly { key: keyof ConfigSettings; env: string }[];

function fromEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

export function mergeSettings(env: Env, file?: ConfigFile): ConfigSettings {
  return {
    personalAccessToken: file?.azure?.pat ?? fromEnv(env, 'AZURE_DEVOPS_PAT'),
    organizationUrl: file?.azure?.organizationUrl ?? fromEnv(env, 'AZURE_DEVOPS_ORG'),
    project: file?.azure?.project ?? fromEnv(env, 'AZURE_DEVOPS_PROJECT'),
    apiVersion: file?.azure?.apiVersion ?? fromEnv(env, 'AZURE_DEVOPS_API_VERSION'),
    timeoutMs: file?.azure?.timeoutMs ?? fromEnv(env, 'TESTSYNC_TIMEOUT_MS'),
    retryAttempts: file?.azure?.retryAttempts ?? fromEnv(env, 'TESTSYNC_RETRY_ATTEMPTS'),
    logLevel: file?.logging?.level ?? fromEnv(env, 'TESTSYNC_LOG_LEVEL'),
    logFormat: file?.logging?.format ?? fromEnv(env, 'TESTSYNC_LOG_FORMAT'),
  };
}

export function formatZodError(label: string, err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}

/**
 * Validate merged settings
 *
 * @throws ConfigurationError naming every missing variable, or listing invalid values
 */
export function resolveConfig(settings: ConfigSettings): SyncConfig {
  const missing = REQUIRED_SETTINGS.filter(({ key }) => !settings[key]).map(({ env }) => env);
  if (missing.length > 0) {
    throw new ConfigurationError({
      message: `Missing required environment variables: ${missing.join(', ')}`,
      suggestion:
        "export AZURE_DEVOPS_PAT='your_token_here' " +
        "AZURE_DEVOPS_ORG='https://dev.azure.com/yourorg' " +
        "AZURE_DEVOPS_PROJECT='Your Project Name'",
      context: { missing },
    });
  }

  const result = syncConfigSchema.safeParse({
    azure: {
      personalAccessToken: settings.personalAccessToken,
      organizationUrl: settings.organizationUrl,
      project: settings.project,
      apiVersion: settings.apiVersion,
      timeoutMs: settings.timeoutMs,
      retryAttempts: settings.retryAttempts,
    },
    logging: { level: settings.logLevel, format: settings.logFormat },
  });
  if (!result.success) {
    throw new ConfigurationError({ message: formatZodError('Invalid configuration', result.error) });
  }
  return result.data;
}

/**
 * Read a JSON config file, expanding `${VAR}` placeholders from `env`
 */
export async function loadConfigFile(configPath: string, env: Env, cwd = process.cwd()): Promise<ConfigFile> {
  const absolutePath = resolve(cwd, configPath);

  let parsed: unknown;
  try {
    const content = await readFile(absolutePath, 'utf-8');
    // UTF-8 BOM (common on Windows) breaks JSON.parse
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (err) {
    throw new ConfigurationError({
      message: `Cannot read config file ${absolutePath}: ${errorMessage(err)}`,
      cause: err instanceof Error ? err : undefined,
    });
  }

  const result = configFileSchema.safeParse(expandEnvVars(parsed, env));
  if (!result.success) {
    throw new ConfigurationError({
      message: formatZodError(`Invalid config file ${absolutePath}`, result.error),
    });
  }
  return result.data;
}

/**
 * Human-readable settings for --show-config. The token itself is never shown.
 */
export function describeConfig(settings: ConfigSettings): string {
  const token = settings.personalAccessToken;
  return [
    'Current Configuration:',
    `   Organization: ${settings.organizationUrl ?? 'Not Set'}`,
    `   Project: ${settings.project ?? 'Not Set'}`,
    `   API Version: ${settings.apiVersion ?? '7.1'}`,
    `   PAT: ${token ? `Set (length: ${token.length})` : 'Not Set'}`,
  ].join('\n');
}
