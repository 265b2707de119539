/**
 * Data model shared by the receivers, the correlation table and the reporter.
 */

// --- Config (user → monitor) ---

export interface StreamConfig {
  name: string;
  port: number;
}

/** User-facing config for createMonitor(); optional fields get MONITOR_DEFAULTS. */
export interface MonitorConfig {
  streams: StreamConfig[];
  evictAfterMs?: number;
  /** 0 disables the periodic stats line. */
  statsIntervalMs?: number;
  /** Bind address for both sockets. Default: 0.0.0.0. */
  host?: string;
  onReport?: (report: Report) => void;
}

/** Normalized config; every optional field has been filled in. */
export interface ResolvedConfig {
  streams: [StreamConfig, StreamConfig];
  evictAfterMs: number;
  statsIntervalMs: number;
  host: string;
}

// --- Shreds ---

/** Slot is the data-unit sequence number, index the fragment within it. */
export interface ShredIdentity {
  readonly slot: bigint;
  readonly index: number;
}

export type ShredKind = 'data' | 'code';

export interface ShredHeader {
  identity: ShredIdentity;
  kind: ShredKind;
  version: number;
  fecSetIndex: number;
}

export interface ArrivalRecord {
  readonly stream: string;
  readonly identity: ShredIdentity;
  readonly kind: ShredKind;
  /** Monotonic receive instant in nanoseconds (process.hrtime.bigint()). */
  readonly timestamp: bigint;
  readonly rawSize: number;
}

/** `first` was pending in the table; `second` completed the pair. */
export interface MatchedPair {
  identity: ShredIdentity;
  first: ArrivalRecord;
  second: ArrivalRecord;
}

export type SubmitResult =
  | { kind: 'pending' }
  | { kind: 'matched'; pair: MatchedPair }
  | { kind: 'duplicate'; existing: ArrivalRecord };

export interface MissReport {
  stream: string;
  identity: ShredIdentity;
  ageNs: bigint;
}

export interface Comparison {
  identity: ShredIdentity;
  winner: string;
  loser: string;
  deltaNs: bigint;
}

// --- Reports (monitor → outputs) ---

export type Report =
  | ({ type: 'match'; line: string } & Comparison)
  | ({ type: 'miss'; line: string } & MissReport);
