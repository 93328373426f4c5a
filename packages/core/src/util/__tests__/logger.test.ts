import { afterEach, describe, expect, it, vi } from 'vitest';

import { consoleLogger, MemoryLogger } from '../logger';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('prefixes console output', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    consoleLogger.warn('imp.json: /hp must be >= 1');
    expect(warn).toHaveBeenCalledWith('[jsonstrata] imp.json: /hp must be >= 1');
  });

  it('prints debug lines only when enabled', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    vi.stubEnv('JSONSTRATA_DEBUG', '');
    consoleLogger.debug('hidden');
    expect(debug).not.toHaveBeenCalled();

    vi.stubEnv('JSONSTRATA_DEBUG', '1');
    consoleLogger.debug('shown');
    expect(debug).toHaveBeenCalledWith('[jsonstrata] shown');
  });

  it('MemoryLogger keeps lines tagged with their level', () => {
    const logger = new MemoryLogger();
    logger.info('a');
    logger.error('b');
    expect(logger.lines).toEqual(['info: a', 'error: b']);
  });
});
