import type { ZodType, ZodTypeDef } from 'zod';
import { ResponseFormatError } from '../shared/errors.js';
import {
  balanceSchema,
  createdTaskSchema,
  errorEnvelopeSchema,
  hcaptchaSolutionSchema,
  imageSolutionSchema,
  readyTaskSchema,
  taskStatusSchema,
} from './schemas.js';
import type {
  CreateTaskResponse,
  HCaptchaSolution,
  ImageSolution,
  JsonObject,
  ReadyTaskResult,
  Solution,
  TaskKind,
  TaskResult,
} from './types.js';

/**
 * Parses `value` with `schema`, turning the first Zod issue into a
 * ResponseFormatError whose `field` is the dotted path of the bad value.
 */
function parseField<Output>(
  schema: ZodType<Output, ZodTypeDef, unknown>,
  value: unknown,
  operation: string,
  prefix?: string,
): Output {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const path = [...(prefix ? [prefix] : []), ...(issue?.path ?? [])];
  const field = path.join('.') || '(root)';
  throw new ResponseFormatError(issue?.message ?? 'Malformed response', operation, field);
}

type ErrorVariant = { status: 'error'; errorId: number; errorCode?: string; description: string };

/**
 * Returns the error variant when the envelope carries a non-zero errorId.
 * A missing errorId counts as success.
 */
export function decodeErrorEnvelope(raw: JsonObject, operation: string): ErrorVariant | null {
  const envelope = parseField(errorEnvelopeSchema, raw, operation);
  const errorId = envelope.errorId ?? 0;
  if (errorId === 0) {
    return null;
  }

  return {
    status: 'error',
    errorId,
    errorCode: envelope.errorCode,
    description: envelope.errorDescription ?? envelope.errorCode ?? `Anti-Captcha error ${errorId}`,
  };
}

export function decodeCreateTaskResponse(
  raw: JsonObject,
  operation = 'createTask',
): CreateTaskResponse {
  const error = decodeErrorEnvelope(raw, operation);
  if (error) {
    return error;
  }

  const { taskId } = parseField(createdTaskSchema, raw, operation);
  return { status: 'created', taskId };
}

/**
 * Decodes a getTaskResult payload. Any status other than "ready" is
 * treated as pending; a ready payload must carry a solution object.
 */
export function decodeTaskResult(raw: JsonObject, operation = 'getTaskResult'): TaskResult {
  const error = decodeErrorEnvelope(raw, operation);
  if (error) {
    return error;
  }

  const { status } = parseField(taskStatusSchema, raw, operation);
  if (status !== 'ready') {
    return { status: 'pending', rawStatus: status };
  }

  const ready = parseField(readyTaskSchema, raw, operation);
  return {
    status: 'ready',
    solution: ready.solution,
    ...(ready.cost !== undefined ? { cost: ready.cost } : {}),
    ...(ready.solveCount !== undefined ? { solveCount: ready.solveCount } : {}),
  };
}

export function decodeImageSolution(
  result: ReadyTaskResult,
  operation = 'decodeSolution',
): ImageSolution {
  const { text } = parseField(imageSolutionSchema, result.solution, operation, 'solution');
  return { kind: 'image', text };
}

export function decodeHCaptchaSolution(
  result: ReadyTaskResult,
  operation = 'decodeSolution',
): HCaptchaSolution {
  const solution = parseField(hcaptchaSolutionSchema, result.solution, operation, 'solution');
  return {
    kind: 'hcaptcha',
    token: solution.gRecaptchaResponse,
    ...(solution.userAgent !== undefined ? { userAgent: solution.userAgent } : {}),
    ...(solution.respKey !== undefined ? { respKey: solution.respKey } : {}),
  };
}

export function decodeSolution(result: ReadyTaskResult, kind: TaskKind): Solution {
  switch (kind) {
    case 'image':
      return decodeImageSolution(result);
    case 'hcaptcha':
      return decodeHCaptchaSolution(result);
  }
}

export function decodeBalance(raw: JsonObject, operation = 'getBalance'): number {
  return parseField(balanceSchema, raw, operation).balance;
}
