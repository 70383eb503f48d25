// src/core/config/index.ts
import { z } from 'zod';
import type { LevelWithSilent } from 'pino';
import { ConfigError } from '../errors.js';
import { getAppDataDir } from './app-dirs.js';
import { APP_NAME, DEFAULT_LISTING_URL, DEFAULT_SITE_URL, DEFAULT_TIMEOUT } from './constants.js';

export interface DecensorConfig {
  dataDir: string;
  siteUrl: string;
  listingUrl: string;
  timeoutMs: number;
  logLevel: LevelWithSilent;
}

export type ConfigOverrides = Partial<DecensorConfig>;

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: 'must be an http(s) URL' });

const configSchema = z.object({
  dataDir: z.string().min(1),
  siteUrl: httpUrl.transform((value) => value.replace(/\/+$/, '')),
  listingUrl: httpUrl,
  timeoutMs: z.coerce.number().int().positive(),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
});

function fromEnv(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const pick = (key: string) => {
    const value = env[key]?.trim();
    return value ? value : undefined;
  };
  return {
    dataDir: pick('DECENSOR_DATA_DIR'),
    siteUrl: pick('DECENSOR_SITE_URL'),
    listingUrl: pick('DECENSOR_LISTING_URL'),
    timeoutMs: pick('DECENSOR_TIMEOUT_MS'),
    logLevel: pick('LOG_LEVEL'),
  };
}

/**
 * Merge explicit overrides, then environment variables, then defaults,
 * and validate the result.
 */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): DecensorConfig {
  const fromEnvironment = fromEnv(env);
  const merged = {
    dataDir: overrides.dataDir ?? fromEnvironment.dataDir ?? getAppDataDir(APP_NAME, process.platform, env),
    siteUrl: overrides.siteUrl ?? fromEnvironment.siteUrl ?? DEFAULT_SITE_URL,
    listingUrl: overrides.listingUrl ?? fromEnvironment.listingUrl ?? DEFAULT_LISTING_URL,
    timeoutMs: overrides.timeoutMs ?? fromEnvironment.timeoutMs ?? DEFAULT_TIMEOUT,
    logLevel: overrides.logLevel ?? fromEnvironment.logLevel ?? 'info',
  };

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'config';
    throw new ConfigError(`Invalid ${field}: ${issue?.message ?? 'invalid value'}`, { field });
  }
  return parsed.data;
}
