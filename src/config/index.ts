/**
 * Configuration Module
 *
 * Loads and validates environment variables for pkg-importers.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';

// Environment schema; every tunable has a default matching pkg.go.dev etiquette
const envSchema = z
  .object({
    // Worker pool
    PKGIMPORTERS_WORKERS: z.coerce.number().int().min(1).default(5),

    // Remote site
    PKGIMPORTERS_BASE_URL: z.string().url().default('https://pkg.go.dev'),

    // Rate gate: one token per interval, burst capacity, jitter window
    PKGIMPORTERS_RATE_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
    PKGIMPORTERS_RATE_BURST: z.coerce.number().int().min(1).default(3),
    PKGIMPORTERS_JITTER_MIN_MS: z.coerce.number().int().nonnegative().default(50),
    PKGIMPORTERS_JITTER_MAX_MS: z.coerce.number().int().nonnegative().default(200),

    // Fetch unit
    PKGIMPORTERS_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
    PKGIMPORTERS_MAX_BODY_BYTES: z.coerce.number().int().positive().default(100 * 1024),

    // Runtime options
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  })
  .refine((env) => env.PKGIMPORTERS_JITTER_MAX_MS >= env.PKGIMPORTERS_JITTER_MIN_MS, {
    message: 'PKGIMPORTERS_JITTER_MAX_MS must not be below PKGIMPORTERS_JITTER_MIN_MS',
    path: ['PKGIMPORTERS_JITTER_MAX_MS'],
  });

/**
 * Raised when the environment does not validate.
 */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment variables:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Build the application configuration from an environment map.
 *
 * @param env - Environment variables (default: process.env)
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    throw new ConfigError(
      parseResult.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = parseResult.data;

  return {
    // Environment
    nodeEnv: parsed.NODE_ENV,
    isProduction: parsed.NODE_ENV === 'production',
    isDevelopment: parsed.NODE_ENV === 'development',
    isTest: parsed.NODE_ENV === 'test',

    workers: parsed.PKGIMPORTERS_WORKERS,
    baseUrl: parsed.PKGIMPORTERS_BASE_URL,

    rateGate: {
      intervalMs: parsed.PKGIMPORTERS_RATE_INTERVAL_MS,
      burst: parsed.PKGIMPORTERS_RATE_BURST,
      jitterMinMs: parsed.PKGIMPORTERS_JITTER_MIN_MS,
      jitterMaxMs: parsed.PKGIMPORTERS_JITTER_MAX_MS,
    },

    fetch: {
      timeoutMs: parsed.PKGIMPORTERS_TIMEOUT_MS,
      maxBodyBytes: parsed.PKGIMPORTERS_MAX_BODY_BYTES,
    },
  } as const;
}

// Re-export types
export type Config = ReturnType<typeof loadConfig>;

let cached: Config | undefined;

/**
 * Application configuration singleton, parsed from process.env on first use.
 *
 * @throws ConfigError on invalid environment
 */
export function getConfig(): Config {
  cached ??= loadConfig();
  return cached;
}

/**
 * Drop the cached configuration; the next getConfig() re-reads process.env.
 */
export function resetConfig(): void {
  cached = undefined;
}
