import { once } from 'events';
import { PassThrough } from 'stream';
import { describe, it, expect } from 'vitest';
import { Logger, bigintReplacer, createSilentLogger, stringifyContext } from './logger.js';

describe('stringifyContext', () => {
  it('should render bigint amounts as decimal strings', () => {
    expect(stringifyContext({ amount: 32n * 10n ** 18n, nested: { fee: 1n } })).toBe(
      '{"amount":"32000000000000000000","nested":{"fee":"1"}}'
    );
  });

  it('should leave other values alone', () => {
    expect(bigintReplacer('key', 'value')).toBe('value');
    expect(bigintReplacer('key', 5)).toBe(5);
  });
});

describe('Logger', () => {
  it('should accept bigint context without throwing when silent', () => {
    const logger = createSilentLogger('test');

    expect(() => logger.info('Deposit accepted', { netAmount: 32n, caller: '0xalice' })).not.toThrow();
    expect(() => logger.error('failed', { error: new Error('boom') })).not.toThrow();
  });

  it('should create child loggers of the same class', () => {
    const child = createSilentLogger('test').child({ pool: 'staking-pool' });

    expect(child).toBeInstanceOf(Logger);
    expect(() => child.warn('rejected', { code: 'PAUSED' })).not.toThrow();
  });

  it('should write bigint context as decimal strings to a stream transport', async () => {
    const stream = new PassThrough();
    const logger = new Logger({ service: 'test', console: false, file: false, stream });
    const written = once(stream, 'data');

    logger.info('Deposit accepted', { netAmount: 32n * 10n ** 18n, caller: '0xalice', nested: { fee: 1n } });

    const [chunk] = await written;
    const entry: unknown = JSON.parse(String(chunk));
    expect(entry).toMatchObject({
      level: 'info',
      message: 'Deposit accepted',
      service: 'test',
      metadata: { netAmount: '32000000000000000000', caller: '0xalice', nested: { fee: '1' } },
    });
  });

  it('should drop stream output when silent', () => {
    const stream = new PassThrough();
    const logger = new Logger({ service: 'test', silent: true, stream });

    logger.warn('rejected', { amount: 1n });

    expect(stream.read()).toBeNull();
  });
});
