import { nsToMs } from './comparator.js';
import type { Comparison } from './types.js';

export interface StatsSnapshot {
  matched: number;
  misses: number;
  duplicates: number;
  malformed: number;
  wins: Record<string, number>;
  /** Mean absolute delta over all matches, in milliseconds; 0 before the first match. */
  avgDeltaMs: number;
  pending: Record<string, number>;
}

/** Running counters for the periodic stats line. */
export class ComparisonStats {
  private matched = 0;
  private misses = 0;
  private duplicates = 0;
  private malformed = 0;
  private deltaSumNs = 0n;
  private readonly wins: Record<string, number> = {};

  constructor(streamNames: readonly string[]) {
    for (const name of streamNames) {
      this.wins[name] = 0;
    }
  }

  recordMatch(comparison: Comparison): void {
    this.matched += 1;
    this.deltaSumNs += comparison.deltaNs;
    this.wins[comparison.winner] = (this.wins[comparison.winner] ?? 0) + 1;
  }

  recordMiss(): void {
    this.misses += 1;
  }

  recordDuplicate(): void {
    this.duplicates += 1;
  }

  recordMalformed(): void {
    this.malformed += 1;
  }

  snapshot(pending: Record<string, number>): StatsSnapshot {
    return {
      matched: this.matched,
      misses: this.misses,
      duplicates: this.duplicates,
      malformed: this.malformed,
      wins: { ...this.wins },
      avgDeltaMs: this.matched === 0 ? 0 : nsToMs(this.deltaSumNs / BigInt(this.matched)),
      pending: { ...pending },
    };
  }
}
