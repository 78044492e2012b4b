// src/ts/utils/moduleLogger.test.ts
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createModuleLogger } from './moduleLogger.js';

describe('createModuleLogger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('suppresses debug and info unless enabled', () => {
    const logger = createModuleLogger('wallet');

    logger.debug('hidden');
    logger.info('hidden');

    expect(console.debug).not.toHaveBeenCalled();
    expect(console.log).not.toHaveBeenCalled();
  });

  it('always prints warnings and errors', () => {
    const logger = createModuleLogger('wallet');
    const cause = new Error('boom');

    logger.warn('slow host');
    logger.error('failed', cause);

    expect(console.warn).toHaveBeenCalledWith('⚠️ [wallet] slow host');
    expect(console.error).toHaveBeenCalledWith('❌ [wallet] failed', cause);
  });

  it('prefixes enabled lines with level emoji and module tag', () => {
    const logger = createModuleLogger('wallet', { enabled: true });

    logger.debug('mounting', { step: 1 });
    logger.info('mounted');

    expect(console.debug).toHaveBeenCalledWith('🐛 [wallet] mounting', { step: 1 });
    expect(console.log).toHaveBeenCalledWith('ℹ️ [wallet] mounted');
    expect(logger.enabled).toBe(true);
    expect(logger.moduleId).toBe('wallet');
  });
});
