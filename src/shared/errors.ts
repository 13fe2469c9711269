/**
 * Base library error. All client errors extend this class.
 *
 * - `code`          short machine-readable identifier (e.g. "ANTICAPTCHA_CANCELLED")
 * - `isOperational` true = expected/recoverable, false = programmer error
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly timestamp: string;

  constructor(
    message: string,
    code: string,
    options: { cause?: unknown; isOperational?: boolean } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = options.isOperational ?? true;
    this.timestamp = new Date().toISOString();

    // Maintains proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      isOperational: this.isOperational,
      timestamp: this.timestamp,
      ...(process.env['NODE_ENV'] !== 'production' ? { stack: this.stack } : {}),
    };
  }
}

/**
 * Error raised by the Anti-Captcha client. `operation` names the
 * client call that failed (e.g. "createTask", "pollUntilReady").
 */
export class AntiCaptchaError extends AppError {
  public readonly operation: string;

  constructor(
    message: string,
    code: string,
    operation: string,
    options: { cause?: unknown } = {},
  ) {
    super(message, code, options);
    this.operation = operation;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      operation: this.operation,
    };
  }
}

/**
 * URL construction, serialization, network, HTTP status or JSON
 * decoding failure. Never retried.
 */
export class TransportError extends AntiCaptchaError {
  public readonly endpoint: string;
  public readonly statusCode?: number;

  constructor(
    message: string,
    operation: string,
    endpoint: string,
    options: { statusCode?: number; cause?: unknown } = {},
  ) {
    super(message, 'ANTICAPTCHA_TRANSPORT_ERROR', operation, { cause: options.cause });
    this.endpoint = endpoint;
    this.statusCode = options.statusCode;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      endpoint: this.endpoint,
      statusCode: this.statusCode,
    };
  }
}

/**
 * The service answered with a non-zero `errorId`. The message is the
 * service's `errorDescription` verbatim.
 */
export class ApiError extends AntiCaptchaError {
  public readonly errorId: number;
  public readonly errorCode?: string;

  constructor(
    message: string,
    operation: string,
    errorId: number,
    errorCode?: string,
  ) {
    super(message, 'ANTICAPTCHA_API_ERROR', operation);
    this.errorId = errorId;
    this.errorCode = errorCode;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      errorId: this.errorId,
      errorCode: this.errorCode,
    };
  }
}

/**
 * A required field was missing or had the wrong type in an otherwise
 * successful response.
 */
export class ResponseFormatError extends AntiCaptchaError {
  public readonly field: string;

  constructor(message: string, operation: string, field: string) {
    super(message, 'ANTICAPTCHA_RESPONSE_FORMAT', operation);
    this.field = field;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
    };
  }
}

/**
 * The deadline expired or the caller aborted while a request or a
 * poll interval was pending.
 */
export class CancellationError extends AntiCaptchaError {
  constructor(message: string, operation: string, options: { cause?: unknown } = {}) {
    super(message, 'ANTICAPTCHA_CANCELLED', operation, options);
  }
}

export class ValidationError extends AppError {
  public readonly field: string;
  public readonly value: unknown;

  constructor(message: string, field: string, value?: unknown) {
    super(message, 'VALIDATION_ERROR');
    this.field = field;
    this.value = value;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
      value: this.value,
    };
  }
}

/**
 * Type guard to distinguish operational errors (expected) from
 * programmer errors (bugs).
 */
export function isOperationalError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}
