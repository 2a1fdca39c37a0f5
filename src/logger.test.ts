import { afterEach, describe, expect, it, vi } from 'vitest';
import { DeliveryError, QuestionUnavailableError } from './errors.ts';
import { createLogger, fmtKV, formatLine } from './logger.ts';

describe('fmtKV', () => {
  it('renders JSON-encoded pairs', () => {
    expect(fmtKV({ a: 1, b: 'x y', c: null })).toBe('a=1 b="x y" c=null');
    expect(fmtKV()).toBe('');
  });

  it('describes errors', () => {
    expect(fmtKV({ err: new QuestionUnavailableError('HTTP 500') })).toBe(
      'err="QuestionUnavailableError[QUESTION_UNAVAILABLE]: HTTP 500"',
    );
  });

  it('includes the cause of an error', () => {
    const err = new DeliveryError('Canal inaccesibil', { chatId: 'c1' }, new Error('Missing Access'));
    expect(fmtKV({ err })).toBe('err="DeliveryError[DELIVERY_FAILED]: Canal inaccesibil <- Error: Missing Access"');
  });
});

describe('formatLine', () => {
  it('puts timestamp, level, module and event first', () => {
    expect(formatLine('info', 'engine', 'round.started', { a: 1 })).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[^\]]+\] INFO  engine round\.started  a=1$/,
    );
    expect(formatLine('error', 'bot', 'boom')).toMatch(/\] ERROR bot boom$/);
  });
});

describe('createLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('filters by LOG_LEVEL and routes warnings to stderr', () => {
    vi.stubEnv('LOG_LEVEL', 'info');
    const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const err = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = createLogger('test');

    log.debug('hidden');
    log.info('shown');
    log.warn('careful');

    expect(out).toHaveBeenCalledTimes(1);
    expect(out.mock.calls[0][0]).toMatch(/INFO  test shown$/);
    expect(err).toHaveBeenCalledTimes(1);
    expect(err.mock.calls[0][0]).toMatch(/WARN  test careful$/);
  });

  it('falls back to info for unknown levels', () => {
    vi.stubEnv('LOG_LEVEL', 'constructor');
    const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const log = createLogger('test');
    log.debug('hidden');
    log.info('shown');
    expect(out).toHaveBeenCalledTimes(1);
  });

  it('stays quiet when silent', () => {
    vi.stubEnv('LOG_LEVEL', 'silent');
    const err = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    createLogger('test').error('boom');
    expect(err).not.toHaveBeenCalled();
  });
});
