import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger } from '../utils/logger';

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe('Logger', () => {
  it('prefixes level and context', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    createLogger('Scanner').warn('slow response', { ms: 1200 });

    expect(warn).toHaveBeenCalledTimes(1);
    const line = String(warn.mock.calls[0][0]);
    expect(line).toContain('[WARN] [Scanner]');
    expect(line).toContain('slow response {\n  "ms": 1200\n}');
  });

  it('honours LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'warn');
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const logger = createLogger('Test');
    logger.debug('hidden');
    logger.info('hidden');
    logger.error('shown', new Error('boom'));

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0][0])).toContain('Error: boom');
  });
});
