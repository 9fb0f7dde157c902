import { describe, it, expect, afterEach, vi } from 'vitest';
import { getLogger, getLogLevel, setLogLevel } from '../logger';

describe('logger', () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it('starts at the configured level (silent under test)', () => {
    expect(initial).toBe('silent');
  });

  it('caches one logger per module', () => {
    expect(getLogger('Engine')).toBe(getLogger('Engine'));
    expect(getLogger('Engine')).not.toBe(getLogger('CalibrationParser'));
  });

  it('setLogLevel changes the active threshold', () => {
    setLogLevel('warn');
    expect(getLogLevel()).toBe('warn');
  });

  // ── Threshold ──────────────────────────────────────────────────────────────

  it('warn is dropped below the error threshold and written at debug', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const log = getLogger('threshold');

    setLogLevel('error');
    log.warn('hi');
    expect(warn).not.toHaveBeenCalled();

    setLogLevel('debug');
    log.warn('hi');
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('silent suppresses every level', () => {
    const spies = [
      vi.spyOn(console, 'debug').mockImplementation(() => undefined),
      vi.spyOn(console, 'info').mockImplementation(() => undefined),
      vi.spyOn(console, 'warn').mockImplementation(() => undefined),
      vi.spyOn(console, 'error').mockImplementation(() => undefined),
    ];
    const log = getLogger('quiet');

    setLogLevel('silent');
    log.debug('a');
    log.info('b');
    log.warn('c');
    log.error('d');

    for (const spy of spies) expect(spy).not.toHaveBeenCalled();
  });

  it('each level goes to its own console method', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = getLogger('routing');

    setLogLevel('debug');
    log.info('started');
    log.error('failed');

    expect(info).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
  });

  // ── Line format ────────────────────────────────────────────────────────────

  it('writes "[ISO timestamp] [LEVEL] message" followed by metadata', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    setLogLevel('debug');

    getLogger('Engine').warn('hi', { code: 'empty_sample' });

    const [line, metadata] = warn.mock.calls[0];
    expect(line).toMatch(/^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[WARN\] hi$/);
    expect(metadata).toEqual({ code: 'empty_sample', module: 'Engine', level: 'warn' });
  });

  it('metadata defaults to module and level only', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    setLogLevel('debug');

    getLogger('CalibrationParser').debug('parsed');

    expect(debug.mock.calls[0][1]).toEqual({ module: 'CalibrationParser', level: 'debug' });
  });
});
