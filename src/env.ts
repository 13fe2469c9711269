import { config } from 'dotenv';
import { z } from 'zod';
import { ValidationError } from './shared/errors.js';

/**
 * Schema for the environment variables read by `loadEnv`.
 * Only the API key is required; everything else falls back to the
 * client's defaults.
 */
const envSchema = z.object({
  // ---------- General ----------
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // ---------- Anti-Captcha ----------
  ANTICAPTCHA_API_KEY: z.string().min(1, 'ANTICAPTCHA_API_KEY is required'),
  ANTICAPTCHA_BASE_URL: z.string().url().optional(),
  ANTICAPTCHA_POLL_INTERVAL_MS: z.coerce.number().int().positive().optional(),
  ANTICAPTCHA_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  ANTICAPTCHA_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  /** Partner attribution id sent with every createTask */
  ANTICAPTCHA_SOFT_ID: z.coerce.number().int().positive().optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validates environment variables. When reading `process.env` (the default),
 * a `.env` file in the working directory is loaded first.
 */
export function loadEnv(source?: Record<string, string | undefined>): Env {
  if (!source) {
    config();
  }

  const result = envSchema.safeParse(source ?? process.env);

  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    const field = result.error.issues[0]?.path.join('.') ?? '(root)';
    throw new ValidationError(`Invalid environment variables: ${formatted}`, field);
  }

  return result.data;
}
