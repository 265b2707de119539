/**
 * Report delivery: every match and miss goes to the log as an info line, and to
 * the onReport callback when one is configured. Callback errors are caught and logged.
 */

import { formatMatchLine, formatMissLine, nsToMs } from './comparator.js';
import { logError, logInfo } from './logger.js';
import type { Comparison, MissReport, Report } from './types.js';

export interface OutputConfig {
  onReport?: (report: Report) => void;
}

export function matchReport(comparison: Comparison): Report {
  return { type: 'match', line: formatMatchLine(comparison), ...comparison };
}

export function missReport(miss: MissReport): Report {
  return { type: 'miss', line: formatMissLine(miss), ...miss };
}

/**
 * Invoke user callback; log and swallow errors so one bad callback doesn't stop the receivers.
 */
export function emitCallback(config: OutputConfig, report: Report): void {
  if (typeof config.onReport !== 'function') return;
  try {
    config.onReport(report);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logError('onReport callback threw', { error: message });
  }
}

/** Structured fields logged alongside the report line. */
export function reportFields(report: Report): Record<string, unknown> {
  const base = {
    event: report.type,
    slot: report.identity.slot.toString(),
    index: report.identity.index,
  };
  if (report.type === 'match') {
    return { ...base, winner: report.winner, loser: report.loser, deltaMs: nsToMs(report.deltaNs) };
  }
  return { ...base, stream: report.stream, ageMs: nsToMs(report.ageNs) };
}

/**
 * Deliver one report to all outputs: log line, then callback.
 */
export function deliverReport(config: OutputConfig, report: Report): void {
  logInfo(report.line, reportFields(report));
  emitCallback(config, report);
}
