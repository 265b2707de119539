/**
 * Line logger: one record per line on stdout, with timestamp, level, message.
 * LOG_FORMAT=json (default) writes JSON; LOG_FORMAT=text writes a readable line.
 * LOG_LEVEL (debug | info | warn | error, default info) sets the threshold.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'text';

export interface LogRecord {
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Optional extra key-value for context. */
  [key: string]: unknown;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

/** Threshold from LOG_LEVEL; unknown values fall back to info. */
export function getLogLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? '').trim().toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

export function getLogFormat(): LogFormat {
  return process.env.LOG_FORMAT === 'text' ? 'text' : 'json';
}

function stringifyValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'bigint') return value.toString();
  return JSON.stringify(value, bigintReplacer);
}

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/** Renders a record as a single line (no trailing newline). */
export function formatRecord(record: LogRecord, format: LogFormat): string {
  if (format === 'json') {
    return JSON.stringify(record, bigintReplacer);
  }
  const { timestamp, level, message, ...extra } = record;
  const fields = Object.entries(extra)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${stringifyValue(v)}`);
  return [timestamp, level.toUpperCase().padEnd(5), message, ...fields].join(' ');
}

function write(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[getLogLevel()]) return;
  const record: LogRecord = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...extra,
  };
  process.stdout.write(formatRecord(record, getLogFormat()) + '\n');
}

export function logInfo(message: string, extra?: Record<string, unknown>): void {
  write('info', message, extra);
}

export function logWarn(message: string, extra?: Record<string, unknown>): void {
  write('warn', message, extra);
}

export function logError(message: string, extra?: Record<string, unknown>): void {
  write('error', message, extra);
}

export function logDebug(message: string, extra?: Record<string, unknown>): void {
  write('debug', message, extra);
}
