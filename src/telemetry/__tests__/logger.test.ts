import { afterEach, describe, expect, it, vi } from 'vitest';
import { logDebug, logError, logInfo, logWarning, resetLogLevel, setLogLevel } from '../logger.js';

afterEach(() => {
  vi.restoreAllMocks();
  resetLogLevel();
});

describe('telemetry logger', () => {
  const cases = [
    { fn: logInfo, level: 'info' as const, method: 'error' as const },
    { fn: logWarning, level: 'warn' as const, method: 'warn' as const },
    { fn: logError, level: 'error' as const, method: 'error' as const },
    { fn: logDebug, level: 'debug' as const, method: 'error' as const },
  ];

  for (const { fn, level, method } of cases) {
    it(`logs message only for ${level} when context is empty`, () => {
      setLogLevel('debug');
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello', {});

      expect(spy).toHaveBeenCalledWith('hello');
    });

    it(`logs message and context for ${level} when context has keys`, () => {
      setLogLevel('debug');
      const spy = vi.spyOn(console, method).mockImplementation(() => {});
      const context = { file: 'Sources/App.swift' };

      fn('hello', context);

      expect(spy).toHaveBeenCalledWith('hello', context);
    });
  }

  it('drops messages below the configured level', () => {
    setLogLevel('warn');
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    logDebug('debug');
    logInfo('info');
    logWarning('warn');

    expect(errorSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('emits nothing when silent', () => {
    setLogLevel('silent');
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    logError('boom');

    expect(errorSpy).not.toHaveBeenCalled();
  });
});
