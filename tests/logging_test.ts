// Logging tests: file output, formats and component loggers

import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, expect, test, vi } from 'vitest';
import { computeLines, getGlobalLogger, getLogger, Logger, PanetextConfig, setGlobalLogger } from '../mod.ts';

let testLogDir: string;

function readLogLines(path: string): string[] {
  return readFileSync(path, 'utf8').split('\n');
}

beforeEach(() => {
  testLogDir = mkdtempSync(join(tmpdir(), 'panetext-log-'));
});

afterEach(() => {
  setGlobalLogger(undefined);
  vi.unstubAllEnvs();
  PanetextConfig.reset();
  rmSync(testLogDir, { recursive: true, force: true });
});

// Runs fn with PANETEXT_LOG_FILE unset so the default log path applies
function withDefaultLogFile(fn: () => void): void {
  const saved = process.env.PANETEXT_LOG_FILE;
  delete process.env.PANETEXT_LOG_FILE;
  try {
    fn();
  } finally {
    if (saved !== undefined) {
      process.env.PANETEXT_LOG_FILE = saved;
    }
  }
}

test('Logger writes text entries at or above its level', () => {
  const logFile = join(testLogDir, 'basic.log');
  const logger = new Logger({
    logFile,
    level: 'DEBUG',
    format: 'text',
    includeTimestamp: false,
    bufferSize: 1, // Immediate writes
    flushInterval: 0,
  });

  logger.info('Test info message');
  logger.debug('Debug details', { count: 2 });
  logger.trace('Not written');
  logger.error('Failed', new Error('boom'));
  logger.close();

  const lines = readLogLines(logFile);
  expect(lines[0].startsWith('INFO  [Logger] Logging session started | ')).toBe(true);
  expect(lines[1]).toBe('INFO  Test info message');
  expect(lines[2]).toBe('DEBUG Debug details | {"count":2}');
  expect(lines[3]).toBe('ERROR Failed | ERROR: boom');
  expect(lines[4].startsWith('INFO  [Logger] Logging session ended | ')).toBe(true);
  expect(lines).toHaveLength(6);

  const stats = logger.getStats();
  expect(stats.totalEntries).toBe(4);
  expect(stats.entriesByLevel).toEqual({ TRACE: 0, DEBUG: 1, INFO: 2, WARN: 0, ERROR: 1, FATAL: 0 });
});

test('Logger buffers entries until flushed', () => {
  const logFile = join(testLogDir, 'buffered.log');
  const logger = new Logger({ logFile, format: 'text', includeTimestamp: false, bufferSize: 10, flushInterval: 0 });

  logger.warn('Held back');
  expect(logger.getStats().bufferSize).toBe(2);

  logger.flush();
  expect(readLogLines(logFile)[1]).toBe('WARN  Held back');
  expect(logger.getStats().bufferSize).toBe(0);
  logger.close();
});

test('Logger with an empty log file writes nothing', () => {
  const logger = new Logger({ logFile: '', flushInterval: 0 });

  expect(logger.isFileLoggingEnabled).toBe(false);
  logger.info('Dropped');
  logger.flush();
  expect(logger.getStats().bufferSize).toBe(0);
  expect(logger.getStats().totalEntries).toBe(1);
  logger.close();
});

test('Logger formats structured and json entries', () => {
  const logger = new Logger({ logFile: '', includeTimestamp: false, format: 'structured' });
  const timestamp = new Date(0);

  expect(logger.formatEntry({ timestamp, level: 'WARN', message: 'm', context: { a: 1, b: 'x' }, source: 'Panel' }))
    .toBe('[WARN] Panel: m | a=1, b="x"\n');

  const jsonLogger = new Logger({ logFile: '', format: 'json' });
  expect(jsonLogger.formatEntry({ timestamp, level: 'INFO', message: 'm' }))
    .toBe('{"timestamp":"1970-01-01T00:00:00.000Z","level":"INFO","message":"m"}\n');
});

test('Logger level can be changed at runtime', () => {
  const logger = new Logger({ logFile: '', level: 'WARN' });

  expect(logger.isLevelEnabled('INFO')).toBe(false);
  logger.setLevel('TRACE');
  expect(logger.isLevelEnabled('TRACE')).toBe(true);
});

test('Component loggers write through the global logger', () => {
  const logFile = join(testLogDir, 'global.log');
  const logger = new Logger({
    logFile,
    level: 'TRACE',
    format: 'text',
    includeTimestamp: false,
    bufferSize: 1,
    flushInterval: 0,
  });
  setGlobalLogger(logger);

  getLogger('Panel').warn('Something odd', { width: 0 });
  computeLines('ab cd', 2, 'wrap-words');
  logger.close();

  const lines = readLogLines(logFile);
  expect(lines[1]).toBe('WARN  [Panel] Something odd | {"width":0}');
  expect(lines[2]).toBe('TRACE [TextLayout] Computed lines | {"width":2,"policy":"wrap-words","lines":["ab","cd"]}');
});

test('Layout at the default log level touches no files', () => {
  const cacheDir = join(testLogDir, 'cache');
  vi.stubEnv('XDG_CACHE_HOME', cacheDir);

  withDefaultLogFile(() => {
    PanetextConfig.reset();
    PanetextConfig.init({ fileConfig: {} });

    expect(computeLines('hello world', 5)).toEqual([{ start: 0, end: 5 }, { start: 6, end: 11 }]);
    expect(existsSync(join(cacheDir, 'panetext'))).toBe(false);
  });
});

test('Layout keeps working when the log directory cannot be created', () => {
  const notADirectory = join(testLogDir, 'file');
  writeFileSync(notADirectory, '');
  vi.stubEnv('XDG_CACHE_HOME', notADirectory);

  withDefaultLogFile(() => {
    PanetextConfig.reset();
    PanetextConfig.init({ fileConfig: { 'log.level': 'TRACE' } });

    expect(computeLines('hello world', 5)).toEqual([{ start: 0, end: 5 }, { start: 6, end: 11 }]);

    const logger = getGlobalLogger();
    expect(() => logger.flush()).not.toThrow();
    expect(logger.isFileLoggingEnabled).toBe(false);
    expect(logger.getStats().writeFailures).toBe(1);
    expect(logger.getStats().lastWriteError?.startsWith('Failed to write to log file ')).toBe(true);

    expect(computeLines('hello world', 5)).toHaveLength(2);
    expect(logger.getStats().bufferSize).toBe(0);
    logger.close();
  });
});

test('Logger turns file output off when the timed flush fails', async () => {
  // A directory cannot be appended to
  const logger = new Logger({ logFile: testLogDir, format: 'text', flushInterval: 20 });

  logger.info('Queued');
  expect(logger.getStats().bufferSize).toBe(2);

  await new Promise(resolve => setTimeout(resolve, 80));

  expect(logger.isFileLoggingEnabled).toBe(false);
  expect(logger.getStats().writeFailures).toBe(1);
  expect(logger.getStats().bufferSize).toBe(0);

  logger.warn('After failure');
  expect(logger.getStats().bufferSize).toBe(0);
  logger.close();
});
