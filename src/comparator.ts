/**
 * Turns matched pairs and misses into comparisons and human-readable lines.
 * Nothing here throws.
 */

import { formatIdentity } from './shred.js';
import type { Comparison, MatchedPair, MissReport } from './types.js';

const NS_PER_US = 1_000n;
const NS_PER_MS = 1_000_000n;
const NS_PER_S = 1_000_000_000n;

/** Earlier timestamp wins; on a tie the record that was already pending wins. */
export function compare(pair: MatchedPair): Comparison {
  const { first, second } = pair;
  const secondEarlier = second.timestamp < first.timestamp;
  const winner = secondEarlier ? second : first;
  const loser = secondEarlier ? first : second;
  return {
    identity: pair.identity,
    winner: winner.stream,
    loser: loser.stream,
    deltaNs: loser.timestamp - winner.timestamp,
  };
}

/**
 * Formats a nanosecond duration in the largest unit that keeps it at or above 1.
 * The unit is chosen after rounding, so 999_999ns is 1.000ms rather than 1000.0µs.
 */
export function formatDuration(ns: bigint): string {
  const abs = ns < 0n ? -ns : ns;
  const sign = ns < 0n ? '-' : '';
  if (abs < NS_PER_US) return `${sign}${abs}ns`;
  const us = (Number(abs) / 1e3).toFixed(1);
  if (abs < NS_PER_MS && Number(us) < 1000) return `${sign}${us}µs`;
  const ms = (Number(abs) / 1e6).toFixed(3);
  if (abs < NS_PER_S && Number(ms) < 1000) return `${sign}${ms}ms`;
  return `${sign}${(Number(abs) / 1e9).toFixed(3)}s`;
}

export function formatMatchLine(comparison: Comparison): string {
  return (
    `shred ${formatIdentity(comparison.identity)}: ` +
    `${comparison.winner} ahead of ${comparison.loser} by ${formatDuration(comparison.deltaNs)}`
  );
}

export function formatMissLine(miss: MissReport): string {
  return (
    `shred ${formatIdentity(miss.identity)}: ` +
    `only seen on ${miss.stream}, evicted after ${formatDuration(miss.ageNs)}`
  );
}

export function nsToMs(ns: bigint): number {
  return Number(ns) / 1e6;
}
