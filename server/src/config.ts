/**
 * Server configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */
import { z } from 'zod';

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  HOST: z.string().default('127.0.0.1'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Storage
  DB_PATH: z.string().min(1).default('data/vaultbook.db'),

  // Domain defaults
  CURRENCY: z.string().regex(/^[A-Z]{3}$/, 'CURRENCY must be an ISO 4217 code').default('EGP'),
  DEFAULT_VAULT_NAME: z.string().trim().min(1).default('Main'),

  // Auth
  SESSION_TTL_MS: z.coerce.number().int().min(60_000).default(12 * 60 * 60 * 1000),
  PASSWORD_HASH_ITERATIONS: z.coerce.number().int().min(1000).default(210_000),

  CORS_ORIGIN: z.string().default('*'),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is present but invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
