import { z } from "zod";

const optionalSecret = z.string().trim().optional().transform(value => value || undefined);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  CORS_ORIGINS: z.string().default('')
    .transform(value => value.split(',').map(origin => origin.trim()).filter(Boolean)),

  SERPAPI_KEY: optionalSecret,
  SERPAPI_BASE_URL: z.string().url().default('https://serpapi.com/search'),
  SEARCH_LANGUAGE: z.string().default('en'),
  SEARCH_COUNTRY: z.string().default('uk'),
  CURRENCY: z.string().length(3).default('GBP'),

  GEMINI_API_KEY: optionalSecret,
  GEMINI_MODEL: z.string().default('gemini-2.5-flash'),
  MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(4000),

  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  UPSTREAM_CONCURRENCY: z.coerce.number().int().min(1).max(10).default(10),
  DATE_SWEEP_DAYS: z.coerce.number().int().min(1).max(14).default(7),
  PLAN_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(20),
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.errors
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
}
