// File-based logging for panetext
// Provides structured logging with multiple output formats

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { PanetextConfig, type LogLevelName } from './config/config.ts';
import { ensureError } from './errors.ts';
import { getCacheDir } from './xdg.ts';

/**
 * Get default log file path (~/.cache/panetext/logs/panetext.log)
 */
function getDefaultLogFile(): string {
  return join(getCacheDir(), 'logs', 'panetext.log');
}

export type LogLevel = LogLevelName;

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: Error;
  source?: string;
  sessionId?: string;
}

export interface LoggerOptions {
  // Path to log file; empty string disables file output
  logFile?: string;

  level?: LogLevel;

  format?: 'json' | 'text' | 'structured';
  includeTimestamp?: boolean;
  includeLevel?: boolean;
  includeSource?: boolean;

  bufferSize?: number;
  flushInterval?: number; // in milliseconds, 0 disables the timer

  consoleOutput?: boolean;
  consoleLevel?: LogLevel;
}

export interface LoggerStats {
  totalEntries: number;
  entriesByLevel: Record<LogLevel, number>;
  bufferSize: number;
  lastFlush: Date;
  // Failed writes; the first one turns file output off
  writeFailures: number;
  lastWriteError?: string;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  TRACE: 0,
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  FATAL: 5,
};

export class Logger {
  private _options: Required<LoggerOptions>;
  private _buffer: LogEntry[] = [];
  private _stats: LoggerStats;
  private _flushTimer?: ReturnType<typeof setInterval>;
  private _initialized = false;
  private _disabled = false;
  private _logDirReady = false;
  private _sessionId: string;

  constructor(options: LoggerOptions = {}) {
    this._options = {
      logFile: options.logFile ?? getDefaultLogFile(),
      level: options.level ?? 'INFO',
      format: options.format ?? 'structured',
      includeTimestamp: options.includeTimestamp ?? true,
      includeLevel: options.includeLevel ?? true,
      includeSource: options.includeSource ?? true,
      bufferSize: options.bufferSize ?? 100,
      flushInterval: options.flushInterval ?? 1000,
      consoleOutput: options.consoleOutput ?? false,
      consoleLevel: options.consoleLevel ?? 'WARN',
    };

    this._sessionId = `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
    this._stats = {
      totalEntries: 0,
      entriesByLevel: { TRACE: 0, DEBUG: 0, INFO: 0, WARN: 0, ERROR: 0, FATAL: 0 },
      bufferSize: 0,
      lastFlush: new Date(),
      writeFailures: 0,
    };
  }

  get isFileLoggingEnabled(): boolean {
    return !this._disabled && this._options.logFile.trim() !== '';
  }

  initializeSync(): void {
    if (this._initialized) {
      return;
    }
    this._initialized = true;

    if (!this.isFileLoggingEnabled) {
      this._disabled = true;
      return;
    }

    // The log directory is created on the first flush, not here
    if (this._options.flushInterval > 0) {
      this._flushTimer = setInterval(() => {
        this.flush();
      }, this._options.flushInterval);
      // The flush timer must never keep the host process alive
      this._flushTimer.unref();
    }

    this._writeEntry({
      timestamp: new Date(),
      level: 'INFO',
      message: 'Logging session started',
      context: {
        sessionId: this._sessionId,
        logFile: this._options.logFile,
      },
      source: 'Logger',
    });
  }

  private _shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this._options.level];
  }

  private _shouldConsole(level: LogLevel): boolean {
    return this._options.consoleOutput &&
           LOG_LEVELS[level] >= LOG_LEVELS[this._options.consoleLevel];
  }

  formatEntry(entry: LogEntry): string {
    switch (this._options.format) {
      case 'json':
        return JSON.stringify({
          ...entry,
          timestamp: entry.timestamp.toISOString(),
          error: entry.error ? {
            message: entry.error.message,
            stack: entry.error.stack,
            name: entry.error.name,
          } : undefined,
        }) + '\n';

      case 'text': {
        let text = '';
        if (this._options.includeTimestamp) {
          text += `[${entry.timestamp.toISOString()}] `;
        }
        if (this._options.includeLevel) {
          text += `${entry.level.padEnd(5)} `;
        }
        if (this._options.includeSource && entry.source) {
          text += `[${entry.source}] `;
        }
        text += entry.message;
        if (entry.context && Object.keys(entry.context).length > 0) {
          text += ` | ${JSON.stringify(entry.context)}`;
        }
        if (entry.error) {
          text += ` | ERROR: ${entry.error.message}`;
        }
        return text + '\n';
      }

      case 'structured':
      default: {
        let structured = '';
        if (this._options.includeTimestamp) {
          structured += `${entry.timestamp.toISOString()} `;
        }
        if (this._options.includeLevel) {
          structured += `[${entry.level}] `;
        }
        if (this._options.includeSource && entry.source) {
          structured += `${entry.source}: `;
        }
        structured += entry.message;

        if (entry.context && Object.keys(entry.context).length > 0) {
          structured += ' | ' + Object.entries(entry.context)
            .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
            .join(', ');
        }
        if (entry.error) {
          structured += `\n  Error: ${entry.error.message}`;
          if (entry.error.stack) {
            structured += `\n  Stack: ${entry.error.stack}`;
          }
        }
        return structured + '\n';
      }
    }
  }

  private _writeEntry(entry: LogEntry): void {
    if (!this._initialized) {
      this.initializeSync();
    }

    this._stats.totalEntries++;
    this._stats.entriesByLevel[entry.level]++;

    if (this._shouldConsole(entry.level)) {
      const formatted = this.formatEntry(entry).trim();
      if (entry.level === 'ERROR' || entry.level === 'FATAL') {
        console.error(formatted);
      } else if (entry.level === 'WARN') {
        console.warn(formatted);
      } else {
        console.log(formatted);
      }
    }

    if (this._disabled) {
      return;
    }

    this._buffer.push(entry);
    this._stats.bufferSize = this._buffer.length;

    if (this._buffer.length >= this._options.bufferSize) {
      this.flush();
    }
  }

  private _log(level: LogLevel, message: string, context?: Record<string, unknown>, source?: string, error?: Error): void {
    if (!this._shouldLog(level)) return;
    this._writeEntry({
      timestamp: new Date(),
      level,
      message,
      context,
      error,
      source,
      sessionId: this._sessionId,
    });
  }

  // Public logging methods

  trace(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('TRACE', message, context, source);
  }

  debug(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('DEBUG', message, context, source);
  }

  info(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('INFO', message, context, source);
  }

  warn(message: string, context?: Record<string, unknown>, source?: string): void {
    this._log('WARN', message, context, source);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>, source?: string): void {
    this._log('ERROR', message, context, source, error);
  }

  fatal(message: string, error?: Error, context?: Record<string, unknown>, source?: string): void {
    this._log('FATAL', message, context, source, error);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this._shouldLog(level);
  }

  /**
   * Write buffered entries to the log file.
   * A failed write drops the entries and turns file output off, so logging
   * never throws into the code being logged.
   */
  flush(): void {
    if (this._buffer.length === 0 || this._disabled) return;

    const entries = this._buffer.splice(0);
    this._stats.bufferSize = 0;
    const content = entries.map(entry => this.formatEntry(entry)).join('');

    try {
      if (!this._logDirReady) {
        mkdirSync(dirname(this._options.logFile), { recursive: true });
        this._logDirReady = true;
      }
      appendFileSync(this._options.logFile, content, 'utf8');
      this._stats.lastFlush = new Date();
    } catch (error) {
      this._disableFileOutput(
        `Failed to write to log file "${this._options.logFile}": ${ensureError(error).message}`,
        entries.length
      );
    }
  }

  private _disableFileOutput(reason: string, droppedEntries: number): void {
    this._disabled = true;
    this._stats.writeFailures++;
    this._stats.lastWriteError = reason;
    if (this._flushTimer) {
      clearInterval(this._flushTimer);
      this._flushTimer = undefined;
    }
    if (this._shouldConsole('ERROR')) {
      console.error(`${reason} (${droppedEntries} entries dropped, file logging disabled)`);
    }
  }

  setLevel(level: LogLevel): void {
    this._options.level = level;
  }

  getStats(): LoggerStats {
    return { ...this._stats };
  }

  close(): void {
    if (this._flushTimer) {
      clearInterval(this._flushTimer);
      this._flushTimer = undefined;
    }

    if (this._disabled || !this._initialized) {
      return;
    }

    this._buffer.push({
      timestamp: new Date(),
      level: 'INFO',
      message: 'Logging session ended',
      context: {
        sessionId: this._sessionId,
        totalEntries: this._stats.totalEntries,
      },
      source: 'Logger',
      sessionId: this._sessionId,
    });
    this.flush();
  }
}

function createDefaultLoggerOptions(): LoggerOptions {
  const config = PanetextConfig.get();

  return {
    level: config.logLevel,
    logFile: config.logFile ?? getDefaultLogFile(),
    format: 'structured',
    includeTimestamp: true,
    includeLevel: true,
    includeSource: true,
    bufferSize: 100,
    flushInterval: 1000,
    // Console output would corrupt the terminal UI
    consoleOutput: false,
    consoleLevel: 'ERROR',
  };
}

let globalLogger: Logger | undefined;

export function createLogger(options?: LoggerOptions): Logger {
  // Initialized on the first entry written, so a logger nobody writes to does no I/O
  return new Logger({ ...createDefaultLoggerOptions(), ...options });
}

export function getGlobalLogger(): Logger {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return globalLogger;
}

export function setGlobalLogger(logger: Logger | undefined): void {
  globalLogger = logger;
}

// Component-specific logger interface that automatically includes source
export interface ComponentLogger {
  trace: (message: string, context?: Record<string, unknown>) => void;
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
  fatal: (message: string, error?: Error, context?: Record<string, unknown>) => void;
  isLevelEnabled: (level: LogLevel) => boolean;
}

/**
 * Logger bound to a component name.
 * The global logger is resolved on every call so setGlobalLogger() takes effect
 * for loggers created at module load.
 */
export function getLogger(name: string): ComponentLogger {
  return {
    trace: (message, context) => getGlobalLogger().trace(message, context, name),
    debug: (message, context) => getGlobalLogger().debug(message, context, name),
    info: (message, context) => getGlobalLogger().info(message, context, name),
    warn: (message, context) => getGlobalLogger().warn(message, context, name),
    error: (message, error, context) => getGlobalLogger().error(message, error, context, name),
    fatal: (message, error, context) => getGlobalLogger().fatal(message, error, context, name),
    isLevelEnabled: (level) => getGlobalLogger().isLevelEnabled(level),
  };
}
