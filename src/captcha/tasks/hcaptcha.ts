import { AppError } from '../../shared/errors.js';
import { componentLogger } from '../../shared/logger.js';
import { decodeHCaptchaSolution } from '../decode.js';
import type { AntiCaptchaClient } from '../client.js';
import { withSolutionDetails, type HCaptchaConfig } from '../hcaptcha-config.js';
import { TASK_TYPES, type HCaptchaSolution, type SolveOptions, type TaskRequest } from '../types.js';

export interface HCaptchaSolveResult {
  /** Value for the page's h-captcha-response / g-recaptcha-response field. */
  token: string;
  /** The input config, plus the userAgent and respKey the service returned. */
  config: HCaptchaConfig;
}

/**
 * Builds the HCaptchaTaskProxyless envelope. `softId` is not part of the
 * envelope; it travels beside it in the createTask request.
 */
export function buildHCaptchaTask(config: HCaptchaConfig): TaskRequest {
  return {
    type: TASK_TYPES.hcaptcha,
    websiteURL: config.websiteUrl,
    websiteKey: config.websiteKey,
    isInvisible: config.isInvisible,
    isEnterprise: config.isEnterprise,
    ...(config.enterprisePayload ? { enterprisePayload: config.enterprisePayload } : {}),
  };
}

export async function createHCaptchaTask(
  client: AntiCaptchaClient,
  config: HCaptchaConfig,
  signal?: AbortSignal,
): Promise<number> {
  return client.createTask(buildHCaptchaTask(config), { softId: config.softId, signal });
}

export async function solveHCaptcha(
  client: AntiCaptchaClient,
  config: HCaptchaConfig,
  options: SolveOptions = {},
): Promise<HCaptchaSolveResult> {
  const log = componentLogger(client.logger, 'task:hcaptcha');
  log.info(
    { websiteUrl: config.websiteUrl, websiteKey: config.websiteKey, isEnterprise: config.isEnterprise },
    'Solving hCaptcha',
  );

  const { taskId, result } = await client.solveTask(buildHCaptchaTask(config), {
    ...options,
    softId: config.softId,
  });

  let solution: HCaptchaSolution;
  try {
    solution = decodeHCaptchaSolution(result, 'solveHCaptcha');
  } catch (error) {
    log.error({ err: error, taskId }, 'Invalid hCaptcha solution in response');
    client.events.emit('task:failed', {
      operation: 'solveHCaptcha',
      code: error instanceof AppError ? error.code : 'UNKNOWN',
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }

  log.info(
    { taskId, hasUserAgent: solution.userAgent !== undefined, hasRespKey: solution.respKey !== undefined },
    'hCaptcha solved',
  );

  return {
    token: solution.token,
    config: withSolutionDetails(config, solution),
  };
}
