import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger, setLogLevel } from './logger';

afterEach(() => {
  vi.restoreAllMocks();
  setLogLevel('info');
});

describe('createLogger', () => {
  it('prefixes lines with the scope', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    createLogger('detector').info('loaded');
    expect(log).toHaveBeenCalledWith('[detector] loaded');
  });

  it('appends formatted errors', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    createLogger('batch').error('Failed a.png', new Error('boom'));
    expect(error).toHaveBeenCalledWith('[batch] Failed a.png: Error: boom');
  });

  it('drops messages below the level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel('error');
    createLogger('x').debug('hidden');
    createLogger('x').warn('hidden');
    expect(debug).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
  });
});
