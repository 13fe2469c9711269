import { loadEnv, type Env } from '../env.js';
import { createLogger, type Logger } from '../shared/logger.js';
import { AntiCaptchaClient, type AntiCaptchaClientConfig } from './client.js';
import type { HttpTransport } from './transport.js';

export interface FromEnvOptions {
  /** Variables to read instead of `process.env` (no `.env` file is loaded). */
  source?: Record<string, string | undefined>;
  logger?: Logger;
  transport?: HttpTransport;
}

/**
 * Maps validated environment variables onto client settings.
 */
export function clientConfigFromEnv(env: Env): AntiCaptchaClientConfig {
  return {
    apiKey: env.ANTICAPTCHA_API_KEY,
    ...(env.ANTICAPTCHA_BASE_URL !== undefined ? { baseUrl: env.ANTICAPTCHA_BASE_URL } : {}),
    ...(env.ANTICAPTCHA_POLL_INTERVAL_MS !== undefined
      ? { pollIntervalMs: env.ANTICAPTCHA_POLL_INTERVAL_MS }
      : {}),
    ...(env.ANTICAPTCHA_TIMEOUT_MS !== undefined ? { timeoutMs: env.ANTICAPTCHA_TIMEOUT_MS } : {}),
    ...(env.ANTICAPTCHA_HTTP_TIMEOUT_MS !== undefined
      ? { httpTimeoutMs: env.ANTICAPTCHA_HTTP_TIMEOUT_MS }
      : {}),
    ...(env.ANTICAPTCHA_SOFT_ID !== undefined ? { softId: env.ANTICAPTCHA_SOFT_ID } : {}),
  };
}

/**
 * Builds a client from environment variables. The logger level follows
 * LOG_LEVEL and pretty-printing is on in development.
 */
export function createAntiCaptchaClientFromEnv(options: FromEnvOptions = {}): AntiCaptchaClient {
  const env = loadEnv(options.source);

  return new AntiCaptchaClient({
    ...clientConfigFromEnv(env),
    logger:
      options.logger ??
      createLogger({ level: env.LOG_LEVEL, pretty: env.NODE_ENV === 'development' }),
    ...(options.transport ? { transport: options.transport } : {}),
  });
}
