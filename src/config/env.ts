import { z } from 'zod';

const booleanFlag = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform((value) => value === 'true')
]);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().url().optional(),
  SEED_SAMPLE_DATA: booleanFlag.default(true),
  OTEL_ENABLED: booleanFlag.default(false),
  OTEL_SERVICE_NAME: z.string().min(1).default('org-directory-api'),
  OTEL_METRIC_EXPORT_INTERVAL_MS: z.coerce.number().int().positive().default(30_000)
});

export type Env = z.infer<typeof envSchema>;

export function getEnv(overrides: Partial<Record<keyof Env, unknown>> = {}): Env {
  return envSchema.parse({
    ...process.env,
    ...overrides
  });
}
