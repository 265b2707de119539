import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { formatRecord, getLogLevel, logDebug, logError, logInfo, logWarn } from './logger.js';

describe('formatRecord', () => {
  const record = {
    timestamp: '2026-01-01T00:00:00.000Z',
    level: 'warn' as const,
    message: '[uk] dropped malformed packet',
    stream: 'uk',
    size: 5,
  };

  it('writes JSON with bigints as strings', () => {
    const line = formatRecord({ ...record, slot: 18_446_744_073_709_551_615n }, 'json');
    assert.equal(
      line,
      '{"timestamp":"2026-01-01T00:00:00.000Z","level":"warn","message":"[uk] dropped malformed packet","stream":"uk","size":5,"slot":"18446744073709551615"}'
    );
  });

  it('writes text with padded level and key=value fields', () => {
    assert.equal(
      formatRecord(record, 'text'),
      '2026-01-01T00:00:00.000Z WARN  [uk] dropped malformed packet stream=uk size=5'
    );
  });

  it('renders objects as JSON and skips undefined fields in text', () => {
    const line = formatRecord(
      { timestamp: 't', level: 'info', message: 'Stats', pending: { uk: 1 }, extra: undefined },
      'text'
    );
    assert.equal(line, 't INFO  Stats pending={"uk":1}');
  });
});

describe('log level threshold', () => {
  let chunks: string[] = [];
  const origWrite = process.stdout.write.bind(process.stdout);
  const origLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    chunks = [];
    process.stdout.write = ((chunk: string | Uint8Array) => {
      chunks.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString());
      return true;
    }) as typeof process.stdout.write;
  });

  afterEach(() => {
    process.stdout.write = origWrite;
    if (origLevel !== undefined) process.env.LOG_LEVEL = origLevel;
    else delete process.env.LOG_LEVEL;
  });

  it('defaults to info and ignores unknown values', () => {
    delete process.env.LOG_LEVEL;
    assert.equal(getLogLevel(), 'info');
    process.env.LOG_LEVEL = 'verbose';
    assert.equal(getLogLevel(), 'info');
    process.env.LOG_LEVEL = ' WARN ';
    assert.equal(getLogLevel(), 'warn');
  });

  it('drops records below the threshold', () => {
    process.env.LOG_LEVEL = 'warn';
    logDebug('d');
    logInfo('i');
    logWarn('w');
    logError('e');
    const levels = chunks.map((c) => (JSON.parse(c) as { level: string }).level);
    assert.deepEqual(levels, ['warn', 'error']);
  });

  it('writes every level to stdout, one line each', () => {
    process.env.LOG_LEVEL = 'debug';
    logDebug('d');
    logError('e', { stream: 'de' });
    assert.equal(chunks.length, 2);
    assert.ok(chunks.every((c) => c.endsWith('\n') && c.indexOf('\n') === c.length - 1));
    assert.equal((JSON.parse(chunks[1]) as { stream: string }).stream, 'de');
  });
});
