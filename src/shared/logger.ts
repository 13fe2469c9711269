import pino, { type DestinationStream, type Level, type Logger, type LoggerOptions } from 'pino';

const errorSerializer = (error: unknown): Record<string, unknown> => {
  if (error instanceof Error) {
    return {
      type: error.constructor.name,
      message: error.message,
      stack: error.stack,
      ...Object.fromEntries(Object.entries(error)),
    };
  }
  return { value: error };
};

/** Paths that may carry the account key; pino replaces them with "[Redacted]". */
const REDACTED_PATHS = ['clientKey', 'apiKey', '*.clientKey', '*.apiKey'];

export type LogLevel = Level | 'silent';

export interface LoggerConfig {
  /** Minimum level to emit. Default: "info" */
  level?: LogLevel;
  /** Pretty-print through pino-pretty. Default: true when NODE_ENV is "development" */
  pretty?: boolean;
  /** Name bound to every line. Default: "AntiCaptcha" */
  name?: string;
  /** Write to this stream instead of stdout. Disables pretty-printing. */
  destination?: DestinationStream;
}

/**
 * Builds a logger for one client. Nothing is shared between calls, so two
 * clients can log at different levels or to different streams.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const pretty = config.destination
    ? false
    : config.pretty ?? process.env['NODE_ENV'] === 'development';

  const options: LoggerOptions = {
    name: config.name ?? 'AntiCaptcha',
    level: config.level ?? 'info',
    redact: REDACTED_PATHS,
    serializers: {
      err: errorSerializer,
      error: errorSerializer,
    },
    base: { pid: process.pid },
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(pretty
      ? {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:HH:MM:ss.l',
              ignore: 'pid,hostname',
              singleLine: false,
            },
          },
        }
      : {}),
  };

  return config.destination ? pino(options, config.destination) : pino(options);
}

/**
 * Child logger tagged with a component name, e.g. "task:hcaptcha".
 */
export function componentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component });
}

export type { Logger };
