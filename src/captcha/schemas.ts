import { z } from 'zod';

/**
 * Zod schemas for the service's JSON responses. The service reuses one
 * loose envelope for success, error and status payloads, so every field
 * beyond `errorId` is checked only once the variant is known.
 */

export const errorEnvelopeSchema = z.object({
  errorId: z
    .number({ invalid_type_error: 'errorId is not a number' })
    .int('errorId is not an integer')
    .optional(),
  errorCode: z.string({ invalid_type_error: 'errorCode is not a string' }).optional(),
  errorDescription: z
    .string({ invalid_type_error: 'errorDescription is not a string' })
    .optional(),
});

export const createdTaskSchema = z.object({
  taskId: z
    .number({
      required_error: 'taskId is missing from response',
      invalid_type_error: 'taskId is not a number',
    })
    .int('taskId is not an integer')
    .positive('taskId is not positive'),
});

export const taskStatusSchema = z.object({
  status: z.string({
    required_error: 'status is missing from response',
    invalid_type_error: 'status is not a string',
  }),
});

export const readyTaskSchema = z.object({
  solution: z.record(z.unknown(), {
    required_error: 'solution is missing from ready response',
    invalid_type_error: 'solution is not an object',
  }),
  cost: z
    .union([z.string(), z.number()])
    .transform((value) => String(value))
    .optional(),
  solveCount: z
    .number({ invalid_type_error: 'solveCount is not a number' })
    .int('solveCount is not an integer')
    .optional(),
});

export const imageSolutionSchema = z.object({
  text: z.string({
    required_error: 'text not found in solution',
    invalid_type_error: 'text in solution is not a string',
  }),
});

export const hcaptchaSolutionSchema = z.object({
  gRecaptchaResponse: z.string({
    required_error: 'gRecaptchaResponse not found in solution',
    invalid_type_error: 'gRecaptchaResponse in solution is not a string',
  }),
  userAgent: z
    .string({ invalid_type_error: 'userAgent in solution is not a string' })
    .optional(),
  respKey: z
    .string({ invalid_type_error: 'respKey in solution is not a string' })
    .optional(),
});

export const balanceSchema = z.object({
  balance: z.number({
    required_error: 'balance is missing from response',
    invalid_type_error: 'balance is not a number',
  }),
});
