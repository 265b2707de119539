/**
 * Config validation and normalization. Runs before any socket is opened;
 * invalid config produces a ConfigError naming the offending field.
 */

import { MAX_PORT, MAX_TIMER_MS, MIN_PORT, MONITOR_DEFAULTS } from './constants.js';
import { ConfigError } from './errors.js';
import type { MonitorConfig, ResolvedConfig, StreamConfig } from './types.js';

function assert(condition: boolean, message: string, field?: string): asserts condition {
  if (!condition) {
    throw new ConfigError(message, field);
  }
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function validateStream(stream: StreamConfig, i: number): StreamConfig {
  const field = `streams[${i}]`;
  assert(stream != null && typeof stream === 'object', `${field} must be an object`, field);
  assert(
    typeof stream.name === 'string' && stream.name.trim() !== '',
    `${field}.name must be a non-empty string`,
    `${field}.name`
  );
  assert(
    typeof stream.port === 'number' &&
      Number.isInteger(stream.port) &&
      stream.port >= MIN_PORT &&
      stream.port <= MAX_PORT,
    `${field}.port must be an integer between ${MIN_PORT} and ${MAX_PORT}`,
    `${field}.port`
  );
  return { name: stream.name.trim(), port: stream.port };
}

/**
 * Validates user config and fills in defaults.
 * Throws ConfigError with a clear message (and field) on invalid config.
 */
export function validateConfig(config: MonitorConfig): ResolvedConfig {
  assert(config != null && typeof config === 'object', 'config must be an object');

  assert(Array.isArray(config.streams), 'streams is required and must be an array', 'streams');
  assert(config.streams.length === 2, 'exactly two streams are required', 'streams');
  const first = validateStream(config.streams[0], 0);
  const second = validateStream(config.streams[1], 1);
  assert(first.name !== second.name, `stream names must differ (both are "${first.name}")`, 'streams[1].name');
  assert(first.port !== second.port, `stream ports must differ (both are ${first.port})`, 'streams[1].port');

  const evictAfterMs = config.evictAfterMs ?? MONITOR_DEFAULTS.evictAfterMs;
  assert(
    isPositiveInteger(evictAfterMs) && evictAfterMs <= MAX_TIMER_MS,
    `evictAfterMs must be a positive integer no greater than ${MAX_TIMER_MS}`,
    'evictAfterMs'
  );

  const statsIntervalMs = config.statsIntervalMs ?? MONITOR_DEFAULTS.statsIntervalMs;
  assert(
    typeof statsIntervalMs === 'number' &&
      Number.isInteger(statsIntervalMs) &&
      statsIntervalMs >= 0 &&
      statsIntervalMs <= MAX_TIMER_MS,
    `statsIntervalMs must be a non-negative integer no greater than ${MAX_TIMER_MS} (0 disables stats)`,
    'statsIntervalMs'
  );

  const host = config.host ?? MONITOR_DEFAULTS.host;
  assert(typeof host === 'string' && host !== '', 'host must be a non-empty string', 'host');

  return {
    streams: [first, second],
    evictAfterMs,
    statsIntervalMs,
    host,
  };
}
