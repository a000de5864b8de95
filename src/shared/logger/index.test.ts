import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, getLogLevel, setLogLevel } from './index.ts';

afterEach(() => {
  setLogLevel('info');
  vi.restoreAllMocks();
});

describe('createLogger', () => {
  it('prefixes messages with the scope', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const log = createLogger('Build');
    log.info('Built circuit');
    log.warn('Skipped chip', { key: 'p1p0' });
    expect(info).toHaveBeenCalledWith('[Build] Built circuit');
    expect(warn).toHaveBeenCalledWith('[Build] Skipped chip', { key: 'p1p0' });
  });

  it('drops messages below the level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const log = createLogger('Eval');

    expect(getLogLevel()).toBe('info');
    log.debug('hidden');
    expect(debug).not.toHaveBeenCalled();

    setLogLevel('debug');
    log.debug('shown');
    expect(debug).toHaveBeenCalledWith('[Eval] shown');

    setLogLevel('silent');
    log.info('hidden');
    expect(info).not.toHaveBeenCalled();
  });
});
