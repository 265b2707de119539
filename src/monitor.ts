/**
 * Monitor: owns the correlation table and both receivers.
 * Public API: createMonitor(config), monitor.start(), monitor.stop(), monitor.isRunning().
 */

import { compare } from './comparator.js';
import { MAX_SWEEP_INTERVAL_MS, MIN_SWEEP_INTERVAL_MS } from './constants.js';
import { CorrelationTable } from './correlation.js';
import { BindError } from './errors.js';
import type { ReceiveError } from './errors.js';
import { logError, logInfo, logWarn } from './logger.js';
import { deliverReport, matchReport, missReport } from './output.js';
import { createReceiver } from './receiver.js';
import type { Receiver } from './receiver.js';
import { formatIdentity } from './shred.js';
import { ComparisonStats } from './stats.js';
import type { StatsSnapshot } from './stats.js';
import type { SocketOpener } from './transport.js';
import type { ArrivalRecord, MonitorConfig, ResolvedConfig } from './types.js';
import { validateConfig } from './validation.js';

export interface MonitorOptions {
  /** Transport used by both receivers. Default: real UDP sockets. */
  openSocket?: SocketOpener;
  /** Monotonic clock in nanoseconds used for eviction. Default: process.hrtime.bigint. */
  clock?: () => bigint;
  /**
   * Called once the monitor has stopped itself because no receiver is left running.
   * `err` is the receive error of the last stream to fail.
   */
  onFailed?: (err: ReceiveError) => void;
}

export interface Monitor {
  start(): Promise<void>;
  stop(): Promise<void>;
  isRunning(): boolean;
  /** Evicts expired pending shreds now and reports each as a miss. */
  sweep(): number;
  stats(): StatsSnapshot;
}

export function sweepIntervalFor(evictAfterMs: number): number {
  return Math.min(MAX_SWEEP_INTERVAL_MS, Math.max(MIN_SWEEP_INTERVAL_MS, Math.floor(evictAfterMs / 10)));
}

/**
 * Creates a monitor. Config is validated on start(), not on create.
 */
export function createMonitor(config: MonitorConfig, options: MonitorOptions = {}): Monitor {
  const clock = options.clock ?? (() => process.hrtime.bigint());
  const table = new CorrelationTable();
  let resolved: ResolvedConfig | null = null;
  let counters = new ComparisonStats([]);
  let receivers: Receiver[] = [];
  let sweepTimer: NodeJS.Timeout | null = null;
  let statsTimer: NodeJS.Timeout | null = null;

  function maxAgeNs(): bigint {
    return resolved === null ? 0n : BigInt(resolved.evictAfterMs) * 1_000_000n;
  }

  function sweep(): number {
    if (resolved === null) return 0;
    const misses = table.evictExpired(clock(), maxAgeNs());
    for (const miss of misses) {
      counters.recordMiss();
      deliverReport(config, missReport(miss));
    }
    return misses.length;
  }

  function onArrival(record: ArrivalRecord): void {
    sweep();
    const result = table.submit(record);
    switch (result.kind) {
      case 'pending':
        return;
      case 'duplicate':
        counters.recordDuplicate();
        logWarn(`[${record.stream}] duplicate shred ${formatIdentity(record.identity)} dropped`, {
          stream: record.stream,
          slot: record.identity.slot.toString(),
          index: record.identity.index,
        });
        return;
      case 'matched': {
        const comparison = compare(result.pair);
        counters.recordMatch(comparison);
        deliverReport(config, matchReport(comparison));
        return;
      }
    }
  }

  function snapshot(): StatsSnapshot {
    return counters.snapshot(table.pendingByStream());
  }

  function logStats(): void {
    logInfo('Stats', { ...snapshot() });
  }

  function clearTimers(): void {
    if (sweepTimer !== null) clearInterval(sweepTimer);
    if (statsTimer !== null) clearInterval(statsTimer);
    sweepTimer = null;
    statsTimer = null;
  }

  function failAll(err: ReceiveError): void {
    logError('No receiver left running; stopping monitor', { stream: err.stream });
    monitor.stop().then(
      () => options.onFailed?.(err),
      (stopErr: unknown) => {
        logError('Error during stop', { err: String(stopErr) });
        options.onFailed?.(err);
      }
    );
  }

  const monitor: Monitor = {
    async start(): Promise<void> {
      if (resolved !== null) {
        throw new Error('Monitor already running');
      }
      const cfg = validateConfig(config);
      counters = new ComparisonStats(cfg.streams.map((s) => s.name));
      logInfo('Starting monitor', {
        streams: cfg.streams,
        host: cfg.host,
        evictAfterMs: cfg.evictAfterMs,
      });

      const created = cfg.streams.map((stream) =>
        createReceiver(stream, onArrival, {
          host: cfg.host,
          openSocket: options.openSocket,
          onMalformed: () => counters.recordMalformed(),
          onFatal: (err) => {
            const others = receivers.filter((r) => r.stream !== err.stream && r.isRunning());
            logWarn(`[${err.stream}] receiver stopped; no further comparisons against it`, {
              stream: err.stream,
              stillRunning: others.map((r) => r.stream),
            });
            if (others.length === 0 && resolved !== null) failAll(err);
          },
        })
      );
      const results = await Promise.allSettled(created.map((r) => r.start()));
      const failed = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
      if (failed !== undefined) {
        await Promise.all(created.map((r) => r.stop()));
        throw failed.reason instanceof BindError ? failed.reason : new Error(String(failed.reason));
      }

      receivers = created;
      resolved = cfg;
      sweepTimer = setInterval(sweep, sweepIntervalFor(cfg.evictAfterMs));
      sweepTimer.unref();
      if (cfg.statsIntervalMs > 0) {
        statsTimer = setInterval(logStats, cfg.statsIntervalMs);
        statsTimer.unref();
      }
    },

    async stop(): Promise<void> {
      if (resolved === null) return;
      resolved = null;
      clearTimers();
      logInfo('Stopping monitor');
      await Promise.all(receivers.map((r) => r.stop()));
      logStats();
      const dropped = table.clear();
      if (dropped > 0) {
        logInfo(`Dropped ${dropped} pending shred(s) at shutdown`, { dropped });
      }
      logInfo('Monitor stopped');
    },

    isRunning(): boolean {
      return resolved !== null;
    },

    sweep,

    stats: snapshot,
  };

  return monitor;
}
