import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger, describeError } from './logger';

describe('Logger', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2025-01-01T12:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should write one JSON line per entry', () => {
    const lines: string[] = [];
    const logger = new Logger('info', (line) => lines.push(line));

    logger.info('Bridge started', { streamKey: 'hitboard:hits' });

    expect(lines).toEqual([
      '{"timestamp":"2025-01-01T12:00:00.000Z","level":"info","msg":"Bridge started","streamKey":"hitboard:hits"}\n',
    ]);
  });

  it('should drop entries below the configured level', () => {
    const lines: string[] = [];
    const logger = new Logger('warn', (line) => lines.push(line));

    logger.debug('noise');
    logger.info('noise');
    logger.warn('kept');
    logger.error('kept too');

    expect(lines.map((line) => JSON.parse(line).level)).toEqual(['warn', 'error']);
  });

  it('should default to info', () => {
    const lines: string[] = [];
    const logger = new Logger(undefined, (line) => lines.push(line));

    logger.debug('hidden');
    logger.info('shown');

    expect(lines).toHaveLength(1);
  });

  it('should repeat child bindings on every line', () => {
    const lines: string[] = [];
    const bridgeLog = new Logger('info', (line) => lines.push(line)).child({ component: 'bridge' });

    bridgeLog.info('PEL recovery', { messageCount: 2 });

    expect(lines).toEqual([
      '{"timestamp":"2025-01-01T12:00:00.000Z","level":"info","msg":"PEL recovery","component":"bridge","messageCount":2}\n',
    ]);
  });

  it('should keep the parent level in children', () => {
    const lines: string[] = [];
    const child = new Logger('warn', (line) => lines.push(line)).child({ component: 'store' });

    child.info('hidden');
    child.warn('MongoDB disconnected');

    expect(lines.map((line) => JSON.parse(line).msg)).toEqual(['MongoDB disconnected']);
  });

  it('should flatten errors passed to error()', () => {
    const lines: string[] = [];
    const logger = new Logger('info', (line) => lines.push(line));

    logger.error('Bridge error', new Error('ECONNRESET'), { component: 'bridge' });

    expect(JSON.parse(lines[0])).toEqual({
      timestamp: '2025-01-01T12:00:00.000Z',
      level: 'error',
      msg: 'Bridge error',
      error: 'ECONNRESET',
      errorName: 'Error',
      component: 'bridge',
    });
  });
});

describe('describeError', () => {
  it('should keep the name and message of errors', () => {
    const err = new TypeError('bad input');
    expect(describeError(err)).toEqual({ error: 'bad input', errorName: 'TypeError' });
  });

  it('should stringify anything else', () => {
    expect(describeError(42)).toEqual({ error: '42' });
  });
});
