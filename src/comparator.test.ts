import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { compare, formatDuration, formatMatchLine, formatMissLine } from './comparator.js';
import type { ArrivalRecord, MatchedPair } from './types.js';

const MS = 1_000_000n;

function pair(first: [string, bigint], second: [string, bigint]): MatchedPair {
  const identity = { slot: 100n, index: 3 };
  const make = ([stream, timestamp]: [string, bigint]): ArrivalRecord => ({
    stream,
    identity,
    kind: 'data',
    timestamp,
    rawSize: 1228,
  });
  return { identity, first: make(first), second: make(second) };
}

describe('compare', () => {
  it('pending record wins when it arrived first', () => {
    assert.deepEqual(compare(pair(['uk', 0n], ['de', 7n * MS])), {
      identity: { slot: 100n, index: 3 },
      winner: 'uk',
      loser: 'de',
      deltaNs: 7n * MS,
    });
  });

  it('completing record wins when its timestamp is earlier', () => {
    const c = compare(pair(['uk', 10n * MS], ['de', 4n * MS]));
    assert.equal(c.winner, 'de');
    assert.equal(c.loser, 'uk');
    assert.equal(c.deltaNs, 6n * MS);
  });

  it('a tie goes to the pending record with zero delta', () => {
    const c = compare(pair(['de', 5n], ['uk', 5n]));
    assert.equal(c.winner, 'de');
    assert.equal(c.loser, 'uk');
    assert.equal(c.deltaNs, 0n);
  });
});

describe('formatDuration', () => {
  it('uses nanoseconds below one microsecond', () => {
    assert.equal(formatDuration(0n), '0ns');
    assert.equal(formatDuration(999n), '999ns');
  });

  it('uses microseconds below one millisecond', () => {
    assert.equal(formatDuration(1_000n), '1.0µs');
    assert.equal(formatDuration(850_500n), '850.5µs');
  });

  it('uses milliseconds below one second', () => {
    assert.equal(formatDuration(7n * MS), '7.000ms');
    assert.equal(formatDuration(12_345_678n), '12.346ms');
  });

  it('uses seconds from one second up', () => {
    assert.equal(formatDuration(1_234_567_890n), '1.235s');
    assert.equal(formatDuration(60_000n * MS), '60.000s');
  });

  it('moves to the next unit when rounding reaches 1000', () => {
    assert.equal(formatDuration(999_999n), '1.000ms');
    assert.equal(formatDuration(999_960n), '1.000ms');
    assert.equal(formatDuration(999_940n), '999.9µs');
    assert.equal(formatDuration(999_999_999n), '1.000s');
    assert.equal(formatDuration(-999_999n), '-1.000ms');
  });

  it('keeps the sign of a negative duration', () => {
    assert.equal(formatDuration(-7n * MS), '-7.000ms');
  });
});

describe('report lines', () => {
  it('names identity, winner, loser and delta for a match', () => {
    const line = formatMatchLine({ identity: { slot: 100n, index: 3 }, winner: 'uk', loser: 'de', deltaNs: 7n * MS });
    assert.equal(line, 'shred slot=100 index=3: uk ahead of de by 7.000ms');
  });

  it('names identity, stream and age for a miss', () => {
    const line = formatMissLine({ stream: 'de', identity: { slot: 200n, index: 1 }, ageNs: 500n * MS });
    assert.equal(line, 'shred slot=200 index=1: only seen on de, evicted after 500.000ms');
  });
});
