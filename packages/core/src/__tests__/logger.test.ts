import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  type LogEntry,
  debug,
  getLogLevel,
  info,
  levelFromEnv,
  onLog,
  setLogLevel,
  timer,
} from '../logger.js';
import * as logger from '../logger.js';

describe('logger', () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it('reads the level from DAGWIRE_DEBUG values', () => {
    expect(levelFromEnv('1')).toBe('debug');
    expect(levelFromEnv('true')).toBe('debug');
    expect(levelFromEnv('warn')).toBe('warn');
    expect(levelFromEnv('error')).toBe('error');
    expect(levelFromEnv(undefined)).toBe('info');
    expect(levelFromEnv('verbose')).toBe('info');
  });

  it('filters below the current level', () => {
    const spy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const entries: LogEntry[] = [];
    const off = onLog((e) => entries.push(e));
    setLogLevel('info');
    debug('hidden');
    setLogLevel('debug');
    debug('shown', { steps: 3 });
    off();
    expect(entries.map((e) => e.message)).toEqual(['shown']);
    expect(entries[0].data).toEqual({ steps: 3 });
    expect(spy).toHaveBeenCalledWith('[dagwire] shown {"steps":3}');
  });

  it('exports only the helpers the packages log through', () => {
    expect(Object.keys(logger).sort()).toEqual([
      'Timer',
      'debug',
      'getLogLevel',
      'info',
      'levelFromEnv',
      'onLog',
      'setLogLevel',
      'timer',
    ]);
  });

  it('silences debug and info at the warn level', () => {
    const entries: LogEntry[] = [];
    const off = onLog((e) => entries.push(e));
    setLogLevel('warn');
    debug('hidden');
    info('hidden too');
    off();
    expect(entries).toEqual([]);
  });

  it('stops delivering after unsubscribe', () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    setLogLevel('info');
    const entries: LogEntry[] = [];
    const off = onLog((e) => entries.push(e));
    info('one');
    off();
    info('two');
    expect(entries.map((e) => e.message)).toEqual(['one']);
  });

  it('times operations at debug level', () => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    setLogLevel('debug');
    const entries: LogEntry[] = [];
    const off = onLog((e) => entries.push(e));
    const duration = timer('work').endWith({ items: 2 });
    off();
    expect(duration).toBeGreaterThanOrEqual(0);
    expect(entries[0].message.startsWith('work: ')).toBe(true);
    expect(entries[0].data?.items).toBe(2);
  });
});
