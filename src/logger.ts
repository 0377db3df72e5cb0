/**
 * Structured logging for ChunkDB.
 *
 * Writes one JSON object per line to stderr so that stdout stays free for
 * the host application.
 * Format: {"ts":"ISO","level":"info","component":"Collection","msg":"...","data":{}}
 */

import { isChunkDbError } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalLogLevel: LogLevel = 'info';

export function setGlobalLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

export function getGlobalLogLevel(): LogLevel {
  return globalLogLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[globalLogLevel];
}

function writeLog(level: LogLevel, component: string, msg: string, data?: LogData): void {
  if (!shouldLog(level)) {
    return;
  }

  const entry: Record<string, unknown> = {
    ts: new Date().toISOString(),
    level,
    component,
    msg,
  };

  if (data !== undefined) {
    entry.data = data;
  }

  process.stderr.write(JSON.stringify(entry) + '\n');
}

/**
 * Serialize an error for the `data` field of a log entry.
 * ChunkDbErrors keep their code and details.
 */
export function errorData(error: unknown): LogData {
  if (isChunkDbError(error)) {
    return { code: error.code, message: error.message, details: error.details ?? {} };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { message: String(error) };
}

/**
 * Create a logger for a specific component.
 *
 * @param component - The component name (e.g., 'Collection', 'ChunkDb')
 */
export function createLogger(component: string): Logger {
  return {
    debug(msg: string, data?: LogData): void {
      writeLog('debug', component, msg, data);
    },
    info(msg: string, data?: LogData): void {
      writeLog('info', component, msg, data);
    },
    warn(msg: string, data?: LogData): void {
      writeLog('warn', component, msg, data);
    },
    error(msg: string, data?: LogData): void {
      writeLog('error', component, msg, data);
    },
  };
}
