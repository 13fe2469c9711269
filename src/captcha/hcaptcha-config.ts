import { z } from 'zod';
import { ValidationError } from '../shared/errors.js';

const hcaptchaConfigSchema = z.object({
  websiteUrl: z.string().url('websiteUrl must be an absolute URL'),
  websiteKey: z.string().min(1, 'websiteKey is required'),
  isInvisible: z.boolean().default(false),
  isEnterprise: z.boolean().default(false),
  /** Extra hCaptcha Enterprise parameters (rqdata, sentry, apiEndpoint, ...). */
  enterprisePayload: z.record(z.unknown()).optional(),
  softId: z.number().int().positive().optional(),
  userAgent: z.string().optional(),
  respKey: z.string().optional(),
});

export type HCaptchaConfigInput = z.input<typeof hcaptchaConfigSchema>;

type HCaptchaConfigOutput = z.output<typeof hcaptchaConfigSchema>;

export type HCaptchaConfig = Readonly<
  Omit<HCaptchaConfigOutput, 'enterprisePayload'> & {
    enterprisePayload?: Readonly<Record<string, unknown>>;
  }
>;

/** Freezes `value` and every object reachable from it. */
function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Builds a validated, frozen hCaptcha challenge description. All fields are
 * given at once; there are no setters.
 */
export function createHCaptchaConfig(input: HCaptchaConfigInput): HCaptchaConfig {
  const result = hcaptchaConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') || '(root)';
    throw new ValidationError(issue?.message ?? 'Invalid hCaptcha config', field);
  }
  const { enterprisePayload, ...fields } = result.data;
  return Object.freeze({
    ...fields,
    // copied so the caller's objects stay mutable and ours do not
    ...(enterprisePayload !== undefined
      ? { enterprisePayload: deepFreeze(structuredClone(enterprisePayload)) }
      : {}),
  });
}

/**
 * Returns a frozen copy of `config` carrying the user agent and response key the
 * service reported with its solution.
 */
export function withSolutionDetails(
  config: HCaptchaConfig,
  details: { userAgent?: string; respKey?: string },
): HCaptchaConfig {
  return Object.freeze({
    ...config,
    ...(details.userAgent !== undefined ? { userAgent: details.userAgent } : {}),
    ...(details.respKey !== undefined ? { respKey: details.respKey } : {}),
  });
}
