/**
 * Anti-Captcha API client.
 *
 * ```ts
 * const client = new AntiCaptchaClient({ apiKey: process.env.ANTICAPTCHA_API_KEY ?? '' });
 * const text = await client.solveImage(base64Png);
 *
 * const { token, config } = await client.solveHCaptcha(
 *   createHCaptchaConfig({ websiteUrl: 'https://example.com/login', websiteKey: 'site-key' }),
 * );
 * ```
 */

export * from './captcha/index.js';

export {
  AppError,
  AntiCaptchaError,
  TransportError,
  ApiError,
  ResponseFormatError,
  CancellationError,
  ValidationError,
  isOperationalError,
} from './shared/errors.js';
export { createLogger, componentLogger, type Logger, type LoggerConfig, type LogLevel } from './shared/logger.js';
export { TypedEventEmitter, type ClientEvents, type ClientEventPayloads } from './shared/events.js';
export { loadEnv, type Env } from './env.js';
