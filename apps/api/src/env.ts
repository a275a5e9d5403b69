import { z } from 'zod';

const optionalKey = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGIN: z.string().optional(),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  FIREBASE_PROJECT_ID: z.string().optional(),
  FIREBASE_SERVICE_ACCOUNT_JSON: z.string().optional(),
  FIREBASE_SERVICE_ACCOUNT_PATH: z.string().optional(),

  ZILLOW_API_BASE_URL: z.string().url().default('https://zillow-com1.p.rapidapi.com'),
  ZILLOW_API_HOST: z.string().default('zillow-com1.p.rapidapi.com'),
  ZILLOW_API_KEY: optionalKey,

  MASHVISOR_API_BASE_URL: z.string().url().default('https://api.mashvisor.com/v1.1'),
  MASHVISOR_API_KEY: optionalKey,

  SERPAPI_BASE_URL: z.string().url().default('https://serpapi.com'),
  SERPAPI_KEY: optionalKey,

  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  NEIGHBORHOOD_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(200)
});

export type Env = z.infer<typeof envSchema>;

export function getEnv(): Env {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    throw new Error(`Invalid environment variables: ${parsed.error.message}`);
  }
  return parsed.data;
}
