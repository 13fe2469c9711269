/**
 * Shared type definitions for the Anti-Captcha client.
 */

export type TaskKind = 'image' | 'hcaptcha';

export const TASK_TYPES = {
  image: 'ImageToTextTask',
  hcaptcha: 'HCaptchaTaskProxyless',
} as const satisfies Record<TaskKind, string>;

export type TaskType = (typeof TASK_TYPES)[TaskKind];

/** A JSON object as returned by the service, before decoding. */
export type JsonObject = Record<string, unknown>;

/** Task envelope placed under `task` in a createTask request. */
export interface TaskRequest {
  type: TaskType;
  [field: string]: unknown;
}

export interface CreateTaskOptions {
  /** Partner attribution id sent beside the task envelope. */
  softId?: number;
  signal?: AbortSignal;
}

export interface SolveOptions {
  /** Caller-side cancellation, chained into the solve deadline. */
  signal?: AbortSignal;
  /** Deadline for the whole solve (creation plus polling). */
  timeoutMs?: number;
}

export type CreateTaskResponse =
  | { status: 'error'; errorId: number; errorCode?: string; description: string }
  | { status: 'created'; taskId: number };

export interface ReadyTaskResult {
  status: 'ready';
  solution: JsonObject;
  cost?: string;
  solveCount?: number;
}

export type TaskResult =
  | { status: 'error'; errorId: number; errorCode?: string; description: string }
  | { status: 'pending'; rawStatus: string }
  | ReadyTaskResult;

export interface ImageSolution {
  kind: 'image';
  text: string;
}

export interface HCaptchaSolution {
  kind: 'hcaptcha';
  token: string;
  userAgent?: string;
  respKey?: string;
}

export type Solution = ImageSolution | HCaptchaSolution;

/**
 * Optional ImageToTextTask flags. Only fields that are set are sent.
 */
export interface ImageTaskOptions {
  /** Answer contains at least two words. */
  phrase?: boolean;
  /** Answer is case sensitive. */
  case?: boolean;
  /** 0 = any, 1 = digits only, 2 = no digits. */
  numeric?: 0 | 1 | 2;
  /** Answer is the result of an arithmetic expression. */
  math?: boolean;
  minLength?: number;
  maxLength?: number;
  /** Instruction shown to the worker. */
  comment?: string;
}
