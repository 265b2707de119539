import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ComparisonStats } from './stats.js';

const MS = 1_000_000n;

describe('ComparisonStats', () => {
  it('starts at zero with a win slot per stream', () => {
    const stats = new ComparisonStats(['uk', 'de']);
    assert.deepEqual(stats.snapshot({}), {
      matched: 0,
      misses: 0,
      duplicates: 0,
      malformed: 0,
      wins: { uk: 0, de: 0 },
      avgDeltaMs: 0,
      pending: {},
    });
  });

  it('averages deltas and counts wins per stream', () => {
    const stats = new ComparisonStats(['uk', 'de']);
    const identity = { slot: 1n, index: 0 };
    stats.recordMatch({ identity, winner: 'uk', loser: 'de', deltaNs: 7n * MS });
    stats.recordMatch({ identity, winner: 'uk', loser: 'de', deltaNs: 3n * MS });
    stats.recordMatch({ identity, winner: 'de', loser: 'uk', deltaNs: 2n * MS });
    stats.recordMiss();
    stats.recordDuplicate();
    stats.recordMalformed();
    stats.recordMalformed();

    const snap = stats.snapshot({ de: 4 });
    assert.equal(snap.matched, 3);
    assert.equal(snap.misses, 1);
    assert.equal(snap.duplicates, 1);
    assert.equal(snap.malformed, 2);
    assert.deepEqual(snap.wins, { uk: 2, de: 1 });
    assert.equal(snap.avgDeltaMs, 4);
    assert.deepEqual(snap.pending, { de: 4 });
  });
});
