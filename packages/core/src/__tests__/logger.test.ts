import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  LedgerLogger,
  createLogger,
  formatLogEntry,
  isLogLevel,
  noopLogger,
  resolveLogger,
  type LogEntry,
  type LoggerOptions,
} from '../logger.js';

function collecting(options: LoggerOptions = {}) {
  const entries: LogEntry[] = [];
  const logger = createLogger({ enabled: true, handler: (e) => entries.push(e), ...options });
  return { logger, entries };
}

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should filter below the configured level', () => {
    const { logger, entries } = collecting();
    logger.debug('debug msg');
    logger.info('info msg');
    logger.warn('warn msg');
    logger.error('error msg');
    expect(entries.map((e) => e.level)).toEqual(['info', 'warn', 'error']);
  });

  it('should only emit errors at error level', () => {
    const { logger, entries } = collecting({ level: 'error' });
    logger.warn('warn');
    logger.error('error');
    expect(entries).toHaveLength(1);
  });

  it('should record the error as message and stack', () => {
    const { logger, entries } = collecting({ module: 'node-a' });
    const failure = new Error('refused');
    logger.error('Broadcast failed', failure, { peer: 'http://p' });

    expect(entries[0]).toEqual({
      level: 'error',
      message: 'Broadcast failed',
      timestamp: expect.any(Number),
      module: 'node-a',
      context: { peer: 'http://p' },
      error: { message: 'refused', stack: failure.stack },
    });
  });

  it('should leave out context and error when none are given', () => {
    const { logger, entries } = collecting();
    logger.info('ready');
    expect(Object.keys(entries[0]!)).toEqual(['level', 'message', 'timestamp', 'module']);
    expect(entries[0]!.module).toBe('custody');
  });

  it('should prefix child modules with the parent module', () => {
    const { logger, entries } = collecting({ module: 'node-a', level: 'debug' });
    logger.child('Replicator').child('broadcast').debug('sent');
    expect(entries[0]!.module).toBe('node-a:Replicator:broadcast');
    expect(entries[0]!.level).toBe('debug');
  });

  it('should be silent under the test environment by default', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ handler: (e) => entries.push(e) });
    logger.error('hidden');
    logger.child('Ledger').error('hidden');
    expect(entries).toHaveLength(0);
  });

  it('should write text lines to the console by default', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(Date, 'now').mockReturnValue(Date.UTC(2024, 0, 1));

    const logger = createLogger({ enabled: true, module: 'node-a' });
    logger.info('Listening', { port: 5000 });
    logger.warn('Peer unreachable');

    expect(log).toHaveBeenCalledWith('2024-01-01T00:00:00.000Z INFO [node-a] Listening {"port":5000}');
    expect(warn).toHaveBeenCalledWith('2024-01-01T00:00:00.000Z WARN [node-a] Peer unreachable');
  });

  it('should write JSON to the console when asked', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(Date, 'now').mockReturnValue(0);

    createLogger({ enabled: true, json: true, module: 'node-a' }).error('boom');

    expect(error).toHaveBeenCalledWith('{"level":"error","message":"boom","timestamp":0,"module":"node-a"}');
  });

  it('should recognize level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});

describe('formatLogEntry', () => {
  it('should append the error message', () => {
    expect(
      formatLogEntry({
        level: 'error',
        message: 'Failed to persist block',
        timestamp: 0,
        module: 'node-a:Ledger',
        error: { message: 'disk full' },
      }),
    ).toBe('1970-01-01T00:00:00.000Z ERROR [node-a:Ledger] Failed to persist block (disk full)');
  });
});

describe('resolveLogger', () => {
  it('should return the noop logger when disabled', () => {
    expect(resolveLogger(false, 'Ledger')).toBe(noopLogger);
    expect(noopLogger.child('Ledger')).toBe(noopLogger);
  });

  it('should scope a parent logger to the component', () => {
    const { logger, entries } = collecting({ module: 'node-a' });
    resolveLogger(logger, 'PeerRegistry').info('Added peer');
    expect(entries[0]!.module).toBe('node-a:PeerRegistry');
  });

  it('should build a logger named after the component from options', () => {
    const entries: LogEntry[] = [];
    const logger = resolveLogger({ enabled: true, handler: (e) => entries.push(e) }, 'Ledger');
    logger.info('ready');
    expect(entries[0]!.module).toBe('Ledger');
  });

  it('should default to a logger named after the component', () => {
    expect(resolveLogger(undefined, 'Ledger')).toBeInstanceOf(LedgerLogger);
  });
});
