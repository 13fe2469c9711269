import { componentLogger, createLogger } from '../../src/shared/logger.js';
import { TransportError } from '../../src/shared/errors.js';

function capture(): { lines: Array<Record<string, unknown>>; write: (line: string) => void } {
  const lines: Array<Record<string, unknown>> = [];
  return { lines, write: (line: string) => lines.push(JSON.parse(line)) };
}

describe('createLogger', () => {
  it('names every line and uses ISO timestamps', () => {
    const sink = capture();
    createLogger({ destination: sink }).info('hello');

    expect(sink.lines).toHaveLength(1);
    expect(sink.lines[0]).toMatchObject({ name: 'AntiCaptcha', level: 'info', msg: 'hello' });
    expect(sink.lines[0]?.['time']).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it('redacts credential fields', () => {
    const sink = capture();
    createLogger({ destination: sink }).info({ clientKey: 'test-secret', body: { apiKey: 'test-secret' } }, 'payload');

    expect(sink.lines[0]).toMatchObject({
      clientKey: '[Redacted]',
      body: { apiKey: '[Redacted]' },
    });
  });

  it('respects the level', () => {
    const sink = capture();
    const log = createLogger({ level: 'warn', destination: sink });
    log.info('skipped');
    log.warn('kept');

    expect(sink.lines.map((line) => line['msg'])).toEqual(['kept']);
  });

  it('serializes errors with their fields', () => {
    const sink = capture();
    const error = new TransportError('Non-2xx status code: 503', 'createTask', '/createTask', { statusCode: 503 });
    createLogger({ destination: sink }).error({ err: error }, error.message);

    expect(sink.lines[0]?.['err']).toMatchObject({
      type: 'TransportError',
      message: 'Non-2xx status code: 503',
      code: 'ANTICAPTCHA_TRANSPORT_ERROR',
      operation: 'createTask',
      endpoint: '/createTask',
      statusCode: 503,
    });
  });

  it('tags child loggers with a component', () => {
    const sink = capture();
    componentLogger(createLogger({ destination: sink }), 'task:image').info('solving');

    expect(sink.lines[0]).toMatchObject({ component: 'task:image', msg: 'solving' });
  });
});
