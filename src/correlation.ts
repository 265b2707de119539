/**
 * Correlation table: first-seen record per shred identity, shared by both receivers.
 *
 * submit() and evictExpired() are synchronous and never yield, so each runs to
 * completion on the event loop before the other receiver's next datagram is
 * handled. That is the exclusion that keeps the pending/matched/duplicate
 * decision and the map mutation together.
 */

import { identityKey } from './shred.js';
import type { ArrivalRecord, MatchedPair, MissReport, SubmitResult } from './types.js';

export class CorrelationTable {
  /** Insertion order is arrival order, so the oldest entries come first. */
  private readonly pending = new Map<string, ArrivalRecord>();
  /**
   * Pairs that already matched, keyed like `pending` and kept for one eviction
   * window after the completing arrival. Late copies of a matched shred are
   * duplicates, not new pending entries.
   */
  private readonly matched = new Map<string, MatchedPair>();

  /** Number of pending (unmatched) entries. */
  get size(): number {
    return this.pending.size;
  }

  /** Number of matched pairs still held for duplicate detection. */
  get matchedSize(): number {
    return this.matched.size;
  }

  submit(record: ArrivalRecord): SubmitResult {
    const key = identityKey(record.identity, record.kind);
    const done = this.matched.get(key);
    if (done !== undefined) {
      return {
        kind: 'duplicate',
        existing: done.first.stream === record.stream ? done.first : done.second,
      };
    }
    const prior = this.pending.get(key);
    if (prior === undefined) {
      this.pending.set(key, record);
      return { kind: 'pending' };
    }
    if (prior.stream === record.stream) {
      return { kind: 'duplicate', existing: prior };
    }
    this.pending.delete(key);
    const pair: MatchedPair = { identity: prior.identity, first: prior, second: record };
    this.matched.set(key, pair);
    return { kind: 'matched', pair };
  }

  /** Pending record for an identity key, if any. */
  get(key: string): ArrivalRecord | undefined {
    return this.pending.get(key);
  }

  /**
   * Removes entries whose age at `now` is at least `maxAgeNs` and returns one miss per
   * pending entry. Matched pairs age from their completing arrival and expire silently.
   * Both scans stop at the first entry that is still young.
   */
  evictExpired(now: bigint, maxAgeNs: bigint): MissReport[] {
    const misses: MissReport[] = [];
    for (const [key, record] of this.pending) {
      const ageNs = now - record.timestamp;
      if (ageNs < maxAgeNs) break;
      this.pending.delete(key);
      misses.push({ stream: record.stream, identity: record.identity, ageNs });
    }
    for (const [key, pair] of this.matched) {
      if (now - pair.second.timestamp < maxAgeNs) break;
      this.matched.delete(key);
    }
    return misses;
  }

  pendingByStream(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const record of this.pending.values()) {
      counts[record.stream] = (counts[record.stream] ?? 0) + 1;
    }
    return counts;
  }

  /** Drops every entry, matched pairs included; returns how many pending entries were dropped. */
  clear(): number {
    const dropped = this.pending.size;
    this.pending.clear();
    this.matched.clear();
    return dropped;
  }
}
