import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, isLogLevel } from '../../../src/utils/logger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops messages below the threshold', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = createLogger('warn');

    logger.debug('hidden');
    logger.warn('shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('nests child scopes in the prefix', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    createLogger('info', 'pipeline').child('stage').info('hello');

    const [prefix, message] = info.mock.calls[0] ?? [];
    expect(String(prefix)).toMatch(/ INFO \[pipeline:stage\]:$/);
    expect(message).toBe('hello');
  });

  it('recognizes log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
