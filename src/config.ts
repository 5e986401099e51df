/** Configuration loader */
import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { ScraperConfig } from './types.js';

export type { ScraperConfig } from './types.js';

export const DEFAULT_API_URL = 'https://api.lobstr.io/v1';

const intFromEnv = (def: number) =>
  z.coerce.number().int().positive().default(def);

const envSchema = z.object({
  API_KEY: z.string().trim().min(1, 'Missing API_KEY in environment variables'),
  LOBSTR_API_URL: z.string().url().default(DEFAULT_API_URL),
  POLL_INTERVAL_MS: intFromEnv(10_000),
  REQUEST_TIMEOUT_MS: intFromEnv(30_000),
  CSV_GENERATION_WAIT_MS: z.coerce.number().int().nonnegative().default(5_000),
  OUTPUT_DIR: z.string().default('.'),
  LOG_FILE: z.string().optional(),
  CACHE_FILE: z.string().optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

/** Blank values count as unset, so `POLL_INTERVAL_MS=` falls back to the default */
const present = (env: NodeJS.ProcessEnv): Record<string, string> =>
  Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1] !== ''),
  );

/**
 * Builds the config from environment variables (and `.env`, which never
 * overrides variables already set). Throws ConfigError on a missing key or
 * malformed value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ScraperConfig {
  const parsed = envSchema.safeParse(present(env));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Configuration error: ${details}. Check your .env file.`);
  }

  const e = parsed.data;
  return {
    apiKey: e.API_KEY,
    apiUrl: e.LOBSTR_API_URL.replace(/\/+$/, ''),
    pollIntervalMs: e.POLL_INTERVAL_MS,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    csvGenerationWaitMs: e.CSV_GENERATION_WAIT_MS,
    outputDir: e.OUTPUT_DIR,
    logFile: e.LOG_FILE ?? path.join(e.OUTPUT_DIR, 'scraper.log'),
    cacheFile: e.CACHE_FILE ?? path.join(e.OUTPUT_DIR, '.squid_id'),
    logLevel: e.LOG_LEVEL,
  };
}

export function loadEnvFile(file = path.resolve(process.cwd(), '.env')): void {
  dotenv.config({ path: file });
}

/**
 * Applies CLI overrides. A new output dir moves the log and cache files with
 * it unless they were set explicitly.
 */
export const createConfig = (base: ScraperConfig, overrides: Partial<ScraperConfig> = {}): ScraperConfig => {
  const outputDir = overrides.outputDir ?? base.outputDir;
  const moved = outputDir !== base.outputDir;
  return {
    ...base,
    ...(moved && {
      logFile: path.join(outputDir, path.basename(base.logFile)),
      cacheFile: path.join(outputDir, path.basename(base.cacheFile)),
    }),
    ...overrides,
  };
};
