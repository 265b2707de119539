import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { configFromOptions, parseArgs } from './args.js';
import { ConfigError } from './errors.js';
import { validateConfig } from './validation.js';

describe('parseArgs', () => {
  const origWrite = process.stdout.write.bind(process.stdout);

  beforeEach(() => {
    process.stdout.write = (() => true) as typeof process.stdout.write;
  });

  afterEach(() => {
    process.stdout.write = origWrite;
  });

  it('builds a config from the four stream flags', () => {
    const outcome = parseArgs(['--name-0', 'uk', '--port-0', '20001', '--name-1', 'de', '--port-1', '20002'], {});
    assert.deepEqual(outcome, {
      kind: 'config',
      config: {
        streams: [
          { name: 'uk', port: 20001 },
          { name: 'de', port: 20002 },
        ],
        evictAfterMs: undefined,
        statsIntervalMs: undefined,
        host: undefined,
      },
    });
  });

  it('converts second-based options to milliseconds', () => {
    const outcome = parseArgs(
      ['--name-0=uk', '--port-0=20001', '--name-1=de', '--port-1=20002', '--timeout-secs', '0.5', '--stats-interval-secs', '0', '--host', '127.0.0.1'],
      {}
    );
    assert.equal(outcome.kind, 'config');
    if (outcome.kind !== 'config') return;
    assert.equal(outcome.config.evictAfterMs, 500);
    assert.equal(outcome.config.statsIntervalMs, 0);
    assert.equal(outcome.config.host, '127.0.0.1');
  });

  it('falls back to environment variables, flags first', () => {
    const outcome = parseArgs(['--name-0', 'uk'], {
      NAME_0: 'ignored',
      PORT_0: '20001',
      NAME_1: 'de',
      PORT_1: '20002',
      TIMEOUT_SECS: '60',
      BIND_HOST: '',
    });
    assert.equal(outcome.kind, 'config');
    if (outcome.kind !== 'config') return;
    assert.deepEqual(outcome.config.streams, [
      { name: 'uk', port: 20001 },
      { name: 'de', port: 20002 },
    ]);
    assert.equal(outcome.config.evictAfterMs, 60_000);
    assert.equal(outcome.config.host, undefined);
  });

  it('turns unknown flags into ConfigError', () => {
    assert.throws(() => parseArgs(['--bogus'], {}), ConfigError);
  });

  it('returns exit 0 for --help', () => {
    assert.deepEqual(parseArgs(['--help'], {}), { kind: 'exit', code: 0 });
  });
});

describe('configFromOptions', () => {
  it('leaves missing or non-numeric values for validation to reject', () => {
    const config = configFromOptions({ name0: 'uk', port0: 'abc', port1: '20002' }, {});
    assert.deepEqual(config.streams[1], { name: '', port: 20002 });
    assert.ok(Number.isNaN(config.streams[0].port));
    assert.throws(
      () => validateConfig(config),
      (err: Error) => err instanceof ConfigError && err.field === 'streams[0].port'
    );
  });

  it('rejects non-numeric timeouts through validation', () => {
    const config = configFromOptions(
      { name0: 'uk', port0: '20001', name1: 'de', port1: '20002', timeoutSecs: '-1' },
      {}
    );
    assert.throws(
      () => validateConfig(config),
      (err: Error) => err instanceof ConfigError && err.field === 'evictAfterMs'
    );
  });
});
