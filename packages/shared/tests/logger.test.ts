import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger } from '../src/utils/logger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops messages below the configured level', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger({ level: 'warn' });

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(spy).toHaveBeenCalledTimes(2);
    expect(spy.mock.calls[0][0]).toMatch(/ WARN w$/);
    expect(spy.mock.calls[1][0]).toMatch(/ ERROR e$/);
  });

  it('defaults to info and prefixes the component name', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger({ name: 'tracer' });

    logger.debug('hidden');
    logger.info('Trace saved');

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toMatch(/^\d{4}-\d{2}-\d{2}T.* INFO \[tracer\] Trace saved$/);
  });
});
