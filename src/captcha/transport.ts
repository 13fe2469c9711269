import got, { type Got } from 'got';

export const DEFAULT_HTTP_TIMEOUT_MS = 60_000;

export interface HttpResponse {
  statusCode: number;
  /** Raw response body; decoding is left to the client. */
  body: string;
}

/**
 * The single HTTP operation the client needs: POST a JSON payload and
 * hand back the status and raw body. Implementations must not retry and
 * must reject as soon as `signal` aborts.
 */
export interface HttpTransport {
  post(url: string, payload: string, signal: AbortSignal): Promise<HttpResponse>;
}

export interface GotTransportConfig {
  /** Per-request timeout in milliseconds. Default: 60000 */
  timeoutMs?: number;
}

/**
 * Default transport backed by got. HTTP error statuses are returned rather
 * than thrown so the client can report them with its own error type.
 */
export class GotTransport implements HttpTransport {
  private readonly client: Got;

  constructor(config: GotTransportConfig = {}) {
    this.client = got.extend({
      timeout: { request: config.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS },
      retry: { limit: 0 },
      throwHttpErrors: false,
      followRedirect: false,
      headers: {
        'Accept': 'application/json',
      },
    });
  }

  async post(url: string, payload: string, signal: AbortSignal): Promise<HttpResponse> {
    const response = await this.client.post(url, {
      body: payload,
      headers: { 'Content-Type': 'application/json' },
      signal,
    });

    return { statusCode: response.statusCode, body: response.body };
  }
}
