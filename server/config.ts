import { z } from 'zod';

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3099),
  CORS_ORIGIN: z.string().default('http://localhost:5173'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  FEED_TIMEOUT_MS: z.coerce.number().int().min(100).default(10_000),
  // Dashboard auto-refresh cadence (10 min)
  REFRESH_TTL_MS: z.coerce.number().int().min(1_000).default(600_000),
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
