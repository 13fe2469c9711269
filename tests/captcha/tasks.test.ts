import { AntiCaptchaClient } from '../../src/captcha/client.js';
import { createHCaptchaConfig } from '../../src/captcha/hcaptcha-config.js';
import { buildHCaptchaTask, createHCaptchaTask } from '../../src/captcha/tasks/hcaptcha.js';
import { buildImageTask, createImageTask } from '../../src/captcha/tasks/image-to-text.js';
import {
  ApiError,
  CancellationError,
  ResponseFormatError,
} from '../../src/shared/errors.js';
import { FakeTransport, hang, json, silentLogger } from '../helpers/fake-transport.js';

const API_KEY = 'test-secret';
const IMAGE = 'iVBORw0KGgoAAAANSUhEUg==';

function client(transport: FakeTransport, pollIntervalMs?: number): AntiCaptchaClient {
  return new AntiCaptchaClient({
    apiKey: API_KEY,
    transport,
    logger: silentLogger(),
    ...(pollIntervalMs !== undefined ? { pollIntervalMs } : {}),
  });
}

describe('image-to-text workflow', () => {
  it('builds the envelope with only the options that are set', () => {
    expect(buildImageTask(IMAGE, { numeric: 1, case: true, comment: undefined })).toEqual({
      type: 'ImageToTextTask',
      body: IMAGE,
      numeric: 1,
      case: true,
    });
  });

  it('forwards an empty image string untouched', async () => {
    const transport = new FakeTransport([json({ errorId: 0, taskId: 8 })]);
    await expect(createImageTask(client(transport), '')).resolves.toBe(8);
    expect(transport.requests[0]?.body).toEqual({
      clientKey: API_KEY,
      task: { type: 'ImageToTextTask', body: '' },
    });
  });

  it('sleeps one interval between a processing and a ready poll', async () => {
    const transport = new FakeTransport([
      json({ errorId: 0, taskId: 7 }),
      json({ status: 'processing' }),
      json({ status: 'ready', solution: { text: 'AB12' } }),
    ]);
    const startedAt = Date.now();

    const text = await client(transport).solveImage(IMAGE);

    const elapsed = Date.now() - startedAt;
    expect(text).toBe('AB12');
    expect(elapsed).toBeGreaterThanOrEqual(1950);
    expect(elapsed).toBeLessThan(4000);
    expect(transport.requests.map((r) => r.url)).toEqual([
      'https://api.anti-captcha.com/createTask',
      'https://api.anti-captcha.com/getTaskResult',
      'https://api.anti-captcha.com/getTaskResult',
    ]);
    expect(transport.requests[2]?.body).toEqual({ clientKey: API_KEY, taskId: 7 });
  });

  it('never polls after a create error', async () => {
    const transport = new FakeTransport([
      json({ errorId: 3, errorCode: 'ERROR_ZERO_CAPTCHA_FILESIZE', errorDescription: 'The size of the captcha you are uploading is less than 100 bytes.' }),
    ]);
    const error = await client(transport).solveImage('AA==').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      message: 'The size of the captcha you are uploading is less than 100 bytes.',
    });
    expect(transport.requests).toHaveLength(1);
  });

  it('never polls when taskId is missing', async () => {
    const transport = new FakeTransport([json({ errorId: 0, taskId: 'abc' })]);
    await expect(client(transport).solveImage(IMAGE)).rejects.toBeInstanceOf(ResponseFormatError);
    expect(transport.requests).toHaveLength(1);
  });

  it('fails when the ready solution has no text', async () => {
    const transport = new FakeTransport([
      json({ errorId: 0, taskId: 7 }),
      json({ errorId: 0, status: 'ready', solution: {} }),
    ]);
    const error = await client(transport).solveImage(IMAGE).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ResponseFormatError);
    expect(error).toMatchObject({ field: 'solution.text', operation: 'solveImage' });
  });

  it('emits task:failed after task:ready when the solution is malformed', async () => {
    const transport = new FakeTransport([
      json({ errorId: 0, taskId: 7 }),
      json({ errorId: 0, status: 'ready', solution: {} }),
    ]);
    const solver = client(transport);
    const events: string[] = [];
    const failed = vi.fn();
    solver.events.on('task:ready', () => events.push('ready'));
    solver.events.on('task:failed', (payload) => {
      events.push('failed');
      failed(payload);
    });

    await expect(solver.solveImage(IMAGE)).rejects.toBeInstanceOf(ResponseFormatError);

    expect(events).toEqual(['ready', 'failed']);
    expect(failed).toHaveBeenCalledWith({
      operation: 'solveImage',
      code: 'ANTICAPTCHA_RESPONSE_FORMAT',
      error: 'text not found in solution',
    });
  });

  it('ends with CancellationError when the task never becomes ready', async () => {
    const transport = new FakeTransport(
      [json({ errorId: 0, taskId: 7 })],
      json({ errorId: 0, status: 'processing' }),
    );
    const failed = vi.fn();
    const solver = client(transport, 10);
    solver.events.on('task:failed', failed);
    const startedAt = Date.now();

    const error = await solver.solveImage(IMAGE, { timeoutMs: 100 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CancellationError);
    expect(error).toMatchObject({ message: 'solveTask timed out after 100ms' });
    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(95);
    expect(failed).toHaveBeenCalledWith({
      operation: 'solveTask',
      code: 'ANTICAPTCHA_CANCELLED',
      error: 'solveTask timed out after 100ms',
    });
  });

  it('interrupts a pending create request at the deadline', async () => {
    const transport = new FakeTransport([hang()]);
    const error = await client(transport).solveImage(IMAGE, { timeoutMs: 50 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CancellationError);
    expect(error).toMatchObject({ message: 'solveTask timed out after 50ms' });
  });

  it('stops when the caller aborts', async () => {
    const transport = new FakeTransport(
      [json({ errorId: 0, taskId: 7 })],
      json({ errorId: 0, status: 'processing' }),
    );
    const solver = client(transport);
    const controller = new AbortController();
    solver.events.on('task:pending', () => controller.abort());

    const error = await solver.solveImage(IMAGE, { signal: controller.signal }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CancellationError);
    expect(error).toMatchObject({ operation: 'pollUntilReady', message: 'pollUntilReady was cancelled' });
    expect(transport.requests).toHaveLength(2);
  });
});

describe('hCaptcha workflow', () => {
  const config = createHCaptchaConfig({
    websiteUrl: 'https://example.com/signup',
    websiteKey: 'site-key',
    softId: 12,
  });

  it('builds the proxyless envelope without softId', () => {
    expect(buildHCaptchaTask(config)).toEqual({
      type: 'HCaptchaTaskProxyless',
      websiteURL: 'https://example.com/signup',
      websiteKey: 'site-key',
      isInvisible: false,
      isEnterprise: false,
    });
  });

  it('carries the enterprise payload', () => {
    const enterprise = createHCaptchaConfig({
      websiteUrl: 'https://example.com/signup',
      websiteKey: 'site-key',
      isEnterprise: true,
      enterprisePayload: { rqdata: 'rq-value' },
    });
    expect(buildHCaptchaTask(enterprise)).toMatchObject({
      isEnterprise: true,
      enterprisePayload: { rqdata: 'rq-value' },
    });
  });

  it('sends softId beside the task', async () => {
    const transport = new FakeTransport([json({ errorId: 0, taskId: 9 })]);
    await expect(createHCaptchaTask(client(transport), config)).resolves.toBe(9);
    expect(transport.requests[0]?.body).toEqual({
      clientKey: API_KEY,
      task: buildHCaptchaTask(config),
      softId: 12,
    });
  });

  it('returns the token and a config enriched with user agent and response key', async () => {
    const transport = new FakeTransport([
      json({ errorId: 0, taskId: 9 }),
      json({
        errorId: 0,
        status: 'ready',
        solution: { gRecaptchaResponse: 'tok', userAgent: 'UA', respKey: 'K' },
      }),
    ]);

    const result = await client(transport).solveHCaptcha(config);

    expect(result.token).toBe('tok');
    expect(result.config.userAgent).toBe('UA');
    expect(result.config.respKey).toBe('K');
    expect(result.config.websiteKey).toBe('site-key');
    expect(config.userAgent).toBeUndefined();
    expect(Object.isFrozen(result.config)).toBe(true);
  });

  it('emits task:failed when the token is missing', async () => {
    const transport = new FakeTransport([
      json({ errorId: 0, taskId: 9 }),
      json({ errorId: 0, status: 'ready', solution: { userAgent: 'UA' } }),
    ]);
    const solver = client(transport);
    const failed = vi.fn();
    solver.events.on('task:failed', failed);

    await expect(solver.solveHCaptcha(config)).rejects.toBeInstanceOf(ResponseFormatError);

    expect(failed).toHaveBeenCalledWith({
      operation: 'solveHCaptcha',
      code: 'ANTICAPTCHA_RESPONSE_FORMAT',
      error: 'gRecaptchaResponse not found in solution',
    });
  });

  it('does not share the enterprise payload with the enriched config', async () => {
    const enterprise = createHCaptchaConfig({
      websiteUrl: 'https://example.com/signup',
      websiteKey: 'site-key',
      enterprisePayload: { rqdata: 'rq-value' },
    });
    const transport = new FakeTransport([
      json({ errorId: 0, taskId: 9 }),
      json({ errorId: 0, status: 'ready', solution: { gRecaptchaResponse: 'tok', userAgent: 'UA' } }),
    ]);

    const result = await client(transport).solveHCaptcha(enterprise);

    expect(Reflect.set(result.config.enterprisePayload ?? {}, 'rqdata', 'changed')).toBe(false);
    expect(enterprise.enterprisePayload?.['rqdata']).toBe('rq-value');
    expect(Object.isFrozen(enterprise.enterprisePayload)).toBe(true);
  });

  it('keeps the config unchanged when the solution has no user agent', async () => {
    const transport = new FakeTransport([
      json({ errorId: 0, taskId: 9 }),
      json({ errorId: 0, status: 'ready', solution: { gRecaptchaResponse: 'tok' } }),
    ]);

    const result = await client(transport).solveHCaptcha(config);

    expect(result.token).toBe('tok');
    expect(result.config).toEqual(config);
  });
});
