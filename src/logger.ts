/**
 * casefile file logger
 *
 * Usage:
 *   import { log, logWarn, logError, logger } from './logger.js';
 *   log('subjects', 'added #3', { name: 'Jane Doe' });
 *
 * Watch in real-time:
 *   tail -f ~/.casefile/casefile.log
 */

import { appendFileSync, existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { getDataDir } from './db/client.js';

type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

function formatTimestamp(): string {
  return new Date().toISOString();
}

export function formatMessage(
  level: LogLevel,
  category: string,
  message: string,
  data?: Record<string, unknown>
): string {
  const timestamp = formatTimestamp();
  const dataStr = data ? ` ${JSON.stringify(data)}` : '';
  return `[${timestamp}] [${level}] [${category}] ${message}${dataStr}\n`;
}

export function getLogPath(): string {
  return join(getDataDir(), 'casefile.log');
}

function safeAppend(line: string): void {
  try {
    const dir = getDataDir();
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    appendFileSync(getLogPath(), line);
  } catch (err) {
    // The log file is best-effort; surface the failure once it matters
    if (process.env.CASEFILE_DEBUG) {
      process.stderr.write(`casefile: cannot write log: ${String(err)}\n`);
    }
  }
}

export function log(category: string, message: string, data?: Record<string, unknown>): void {
  const line = formatMessage('INFO', category, message, data);
  safeAppend(line);
  if (process.env.CASEFILE_DEBUG) {
    process.stdout.write(line);
  }
}

export function logDebug(category: string, message: string, data?: Record<string, unknown>): void {
  if (process.env.CASEFILE_DEBUG) {
    const line = formatMessage('DEBUG', category, message, data);
    safeAppend(line);
    process.stdout.write(line);
  }
}

export function logWarn(category: string, message: string, data?: Record<string, unknown>): void {
  const line = formatMessage('WARN', category, message, data);
  safeAppend(line);
  if (process.env.CASEFILE_DEBUG) {
    process.stderr.write(line);
  }
}

export function logError(category: string, message: string, data?: Record<string, unknown>): void {
  const line = formatMessage('ERROR', category, message, data);
  safeAppend(line);
  process.stderr.write(line);
}

// Convenience functions for common operations
export const logger = {
  added: (entity: string, id: number, data?: Record<string, unknown>) =>
    log(entity, `added #${id}`, data),

  updated: (entity: string, id: number, fields: string[]) =>
    log(entity, `updated #${id}`, { fields }),

  removed: (entity: string, id: number) => log(entity, `removed #${id}`),

  rejected: (entity: string, reason: string) => logWarn(entity, `rejected: ${reason}`),

  request: (method: string, path: string, status: number) =>
    logDebug('http', `${method} ${path} → ${status}`),

  server: (event: string, data?: Record<string, unknown>) => log('server', event, data),
};
