import { z } from 'zod';
import { componentLogger, createLogger, type Logger } from '../shared/logger.js';
import {
  AntiCaptchaError,
  ApiError,
  AppError,
  CancellationError,
  TransportError,
  ValidationError,
} from '../shared/errors.js';
import { TypedEventEmitter } from '../shared/events.js';
import { createDeadline, elapsedSince, sleep } from '../shared/timing.js';
import { decodeBalance, decodeCreateTaskResponse, decodeErrorEnvelope, decodeTaskResult } from './decode.js';
import type { HCaptchaConfig } from './hcaptcha-config.js';
import { solveHCaptcha, type HCaptchaSolveResult } from './tasks/hcaptcha.js';
import { solveImage } from './tasks/image-to-text.js';
import { GotTransport, DEFAULT_HTTP_TIMEOUT_MS, type HttpTransport } from './transport.js';
import {
  TASK_TYPES,
  type CreateTaskOptions,
  type ImageTaskOptions,
  type JsonObject,
  type ReadyTaskResult,
  type SolveOptions,
  type TaskKind,
  type TaskRequest,
  type TaskResult,
} from './types.js';

export const API_URL = 'https://api.anti-captcha.com';
export const DEFAULT_POLL_INTERVAL_MS = 2_000;
export const DEFAULT_TIMEOUT_MS = 60_000;

const clientConfigSchema = z.object({
  apiKey: z.string({ required_error: 'apiKey is required' }).min(1, 'apiKey is required'),
  baseUrl: z.string().url('baseUrl must be an absolute URL').default(API_URL),
  pollIntervalMs: z.number().int().positive().default(DEFAULT_POLL_INTERVAL_MS),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  httpTimeoutMs: z.number().int().positive().default(DEFAULT_HTTP_TIMEOUT_MS),
  softId: z.number().int().positive().optional(),
});

export type AntiCaptchaClientConfig = z.input<typeof clientConfigSchema> & {
  /** Logger for every request and task; a fresh stdout logger when omitted. */
  logger?: Logger;
  /** HTTP transport; a GotTransport with `httpTimeoutMs` when omitted. */
  transport?: HttpTransport;
};

export interface SolvedTask {
  taskId: number;
  result: ReadyTaskResult;
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function kindOf(task: TaskRequest): TaskKind {
  return task.type === TASK_TYPES.image ? 'image' : 'hcaptcha';
}

/**
 * Anti-Captcha API client. Holds the account key, the transport and the
 * logger; keeps no per-call state, so one instance may serve concurrent
 * solves.
 */
export class AntiCaptchaClient {
  readonly events = new TypedEventEmitter();
  readonly logger: Logger;

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly transport: HttpTransport;
  private readonly log: Logger;
  readonly pollIntervalMs: number;
  readonly timeoutMs: number;
  readonly softId: number | undefined;

  constructor(config: AntiCaptchaClientConfig) {
    const { logger, transport, ...settings } = config;
    const parsed = clientConfigSchema.safeParse(settings);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      // the key itself is never attached to the error
      throw new ValidationError(
        issue?.message ?? 'Invalid client config',
        issue?.path.join('.') || '(root)',
      );
    }

    this.apiKey = parsed.data.apiKey;
    this.baseUrl = parsed.data.baseUrl.replace(/\/+$/, '');
    this.pollIntervalMs = parsed.data.pollIntervalMs;
    this.timeoutMs = parsed.data.timeoutMs;
    this.softId = parsed.data.softId;
    this.transport = transport ?? new GotTransport({ timeoutMs: parsed.data.httpTimeoutMs });
    this.logger = logger ?? createLogger();
    this.log = componentLogger(this.logger, 'client');
  }

  /**
   * Sends one authenticated JSON POST and returns the decoded JSON object.
   * Exactly one round-trip; nothing is retried.
   */
  async request(
    endpoint: string,
    body: JsonObject = {},
    signal?: AbortSignal,
    operation = 'request',
  ): Promise<JsonObject> {
    let url: string;
    try {
      url = new URL(`${this.baseUrl}${endpoint}`).toString();
    } catch (error) {
      throw this.fail(
        new TransportError(`Failed to parse URL for ${endpoint}`, operation, endpoint, { cause: error }),
      );
    }

    let payload: string;
    try {
      // the client's key always wins over a clientKey in the body
      payload = JSON.stringify({ ...body, clientKey: this.apiKey });
    } catch (error) {
      throw this.fail(
        new TransportError('Failed to marshal request body', operation, endpoint, { cause: error }),
      );
    }

    const requestSignal = signal ?? new AbortController().signal;
    if (requestSignal.aborted) {
      throw this.fail(this.cancelled(requestSignal, operation));
    }

    this.log.debug({ endpoint, bytes: Buffer.byteLength(payload) }, 'Sending request');

    let statusCode: number;
    let responseBody: string;
    try {
      ({ statusCode, body: responseBody } = await this.transport.post(url, payload, requestSignal));
    } catch (error) {
      if (requestSignal.aborted) {
        throw this.fail(this.cancelled(requestSignal, operation, error));
      }
      const message = error instanceof Error ? error.message : String(error);
      throw this.fail(
        new TransportError(`Request failed: ${message}`, operation, endpoint, { cause: error }),
      );
    }

    if (statusCode < 200 || statusCode >= 300) {
      throw this.fail(
        new TransportError(`Non-2xx status code: ${statusCode}`, operation, endpoint, { statusCode }),
      );
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(responseBody);
    } catch (error) {
      throw this.fail(
        new TransportError('Failed to decode response', operation, endpoint, { statusCode, cause: error }),
      );
    }

    if (!isJsonObject(decoded)) {
      throw this.fail(
        new TransportError('Response body is not a JSON object', operation, endpoint, { statusCode }),
      );
    }

    this.log.debug(
      { endpoint, statusCode, bytes: Buffer.byteLength(responseBody) },
      'Received response',
    );
    return decoded;
  }

  /**
   * Submits a task envelope and returns the task id.
   */
  async createTask(task: TaskRequest, options: CreateTaskOptions = {}): Promise<number> {
    const softId = options.softId ?? this.softId;
    this.log.info({ type: task.type }, 'Creating task');

    const raw = await this.request(
      '/createTask',
      { task, ...(softId !== undefined ? { softId } : {}) },
      options.signal,
      'createTask',
    );

    const response = this.decoded(() => decodeCreateTaskResponse(raw));
    if (response.status === 'error') {
      throw this.fail(
        new ApiError(response.description, 'createTask', response.errorId, response.errorCode),
      );
    }

    this.log.info({ taskId: response.taskId, type: task.type }, 'Task created');
    this.events.emit('task:created', { taskId: response.taskId, kind: kindOf(task) });
    return response.taskId;
  }

  /**
   * Reads the current state of a task once.
   */
  async getTaskResult(taskId: number, signal?: AbortSignal): Promise<TaskResult> {
    this.log.debug({ taskId }, 'Checking task result');
    const raw = await this.request('/getTaskResult', { taskId }, signal, 'getTaskResult');
    return this.decoded(() => decodeTaskResult(raw));
  }

  /**
   * Polls a task every `pollIntervalMs` until it is ready, bounded by its own
   * deadline (default `timeoutMs`).
   */
  async pollUntilReady(taskId: number, options: SolveOptions = {}): Promise<ReadyTaskResult> {
    return this.withDeadline('pollUntilReady', options, (signal) => this.poll(taskId, signal));
  }

  /**
   * Creates a task and polls it to completion under a single deadline.
   */
  async solveTask(
    task: TaskRequest,
    options: SolveOptions & { softId?: number } = {},
  ): Promise<SolvedTask> {
    return this.withDeadline('solveTask', options, async (signal) => {
      const taskId = await this.createTask(task, { softId: options.softId, signal });
      const result = await this.poll(taskId, signal);
      return { taskId, result };
    });
  }

  /** Solves an image CAPTCHA given as base64 and returns its text. */
  async solveImage(
    imageData: string,
    options: SolveOptions & { image?: ImageTaskOptions } = {},
  ): Promise<string> {
    return solveImage(this, imageData, options);
  }

  /** Solves an hCaptcha challenge and returns the token and the enriched config. */
  async solveHCaptcha(config: HCaptchaConfig, options: SolveOptions = {}): Promise<HCaptchaSolveResult> {
    return solveHCaptcha(this, config, options);
  }

  async getBalance(signal?: AbortSignal): Promise<number> {
    const raw = await this.request('/getBalance', {}, signal, 'getBalance');
    this.throwIfApiError(raw, 'getBalance');
    const balance = this.decoded(() => decodeBalance(raw));
    this.log.info({ balance }, 'Fetched account balance');
    return balance;
  }

  async reportIncorrectImage(taskId: number, signal?: AbortSignal): Promise<void> {
    await this.report('/reportIncorrectImageCaptcha', taskId, 'reportIncorrectImage', signal);
  }

  async reportIncorrectHCaptcha(taskId: number, signal?: AbortSignal): Promise<void> {
    await this.report('/reportIncorrectHcaptcha', taskId, 'reportIncorrectHCaptcha', signal);
  }

  private async report(
    endpoint: string,
    taskId: number,
    operation: string,
    signal?: AbortSignal,
  ): Promise<void> {
    const raw = await this.request(endpoint, { taskId }, signal, operation);
    this.throwIfApiError(raw, operation);
    this.log.info({ taskId, endpoint }, 'Reported incorrect solution');
  }

  private async poll(taskId: number, signal: AbortSignal): Promise<ReadyTaskResult> {
    const startedAt = Date.now();

    for (let attempt = 1; ; attempt++) {
      const result = await this.getTaskResult(taskId, signal);

      if (result.status === 'error') {
        throw this.fail(
          new ApiError(result.description, 'getTaskResult', result.errorId, result.errorCode),
        );
      }

      if (result.status === 'ready') {
        const durationMs = elapsedSince(startedAt);
        this.log.info({ taskId, attempt, durationMs, cost: result.cost }, 'Task is ready');
        this.events.emit('task:ready', { taskId, durationMs, cost: result.cost });
        return result;
      }

      this.log.info({ taskId, attempt, status: result.rawStatus }, 'Task is still processing');
      this.events.emit('task:pending', { taskId, attempt, status: result.rawStatus });

      try {
        await sleep(this.pollIntervalMs, signal);
      } catch (error) {
        throw this.fail(this.cancelled(signal, 'pollUntilReady', error));
      }
    }
  }

  private async withDeadline<T>(
    operation: string,
    options: SolveOptions,
    fn: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const deadline = createDeadline(
      timeoutMs,
      () => new CancellationError(`${operation} timed out after ${timeoutMs}ms`, operation),
      options.signal,
    );

    try {
      return await fn(deadline.signal);
    } catch (error) {
      this.events.emit('task:failed', {
        operation: error instanceof AntiCaptchaError ? error.operation : operation,
        code: error instanceof AppError ? error.code : 'UNKNOWN',
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      deadline.dispose();
    }
  }

  private throwIfApiError(raw: JsonObject, operation: string): void {
    const error = this.decoded(() => decodeErrorEnvelope(raw, operation));
    if (error) {
      throw this.fail(new ApiError(error.description, operation, error.errorId, error.errorCode));
    }
  }

  private decoded<T>(decode: () => T): T {
    try {
      return decode();
    } catch (error) {
      if (error instanceof AntiCaptchaError) {
        throw this.fail(error);
      }
      throw error;
    }
  }

  private cancelled(signal: AbortSignal, operation: string, cause?: unknown): CancellationError {
    const reason: unknown = signal.reason;
    if (reason instanceof CancellationError) {
      return reason;
    }
    return new CancellationError(`${operation} was cancelled`, operation, { cause: reason ?? cause });
  }

  private fail<E extends AntiCaptchaError>(error: E): E {
    if (error instanceof CancellationError) {
      this.log.warn({ operation: error.operation }, error.message);
    } else {
      this.log.error({ err: error, operation: error.operation }, error.message);
    }
    return error;
  }
}
