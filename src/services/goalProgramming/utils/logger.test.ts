import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from './logger';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes lines with the component tag', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    createLogger('HiGHS', 'info').info('Solving problem', 3);
    expect(log).toHaveBeenCalledWith('[HiGHS] Solving problem', 3);
  });

  it('gates info and debug by level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    createLogger('Model', 'silent').info('hidden');
    createLogger('Model', 'info').debug('hidden');
    expect(log).not.toHaveBeenCalled();

    createLogger('Model', 'debug').debug('shown');
    expect(log).toHaveBeenCalledWith('[Model] shown');
  });

  it('always emits warnings and errors', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger('GLPK', 'silent');
    logger.warn('careful');
    logger.error('Solve error:', 'boom');
    expect(warn).toHaveBeenCalledWith('[GLPK] careful');
    expect(error).toHaveBeenCalledWith('[GLPK] Solve error:', 'boom');
  });
});
