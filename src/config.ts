import { z } from 'zod';

const flag = z
  .string()
  .optional()
  .transform((v) => v !== undefined && v !== '' && v !== '0' && v.toLowerCase() !== 'false');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  CATALOG_URL: z.string().url().default('https://openrouter.ai/api/v1/models'),
  CATALOG_API_KEY: z.string().min(1).optional(),
  DISCORD_WEBHOOK: z.string().url().optional(),
  SNAPSHOT_FILE: z.string().default('./models_snapshot.json'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  WEBHOOK_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  NOTIFY_SECTION_LIMIT: z.coerce.number().int().positive().default(10),
  TEST_DISCORD: flag,
});

export type Config = z.infer<typeof envSchema>;

/** Parses the environment, treating empty variables as unset. */
export function loadConfig(env: NodeJS.ProcessEnv): Config {
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  return envSchema.parse(present);
}

export const config = loadConfig(process.env);
