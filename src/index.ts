/**
 * shredrace — compare arrival times of the same shreds on two UDP feeds.
 */

export { createMonitor, sweepIntervalFor } from './monitor.js';
export type { Monitor, MonitorOptions } from './monitor.js';

export { createReceiver } from './receiver.js';
export type { ArrivalSink, Receiver, ReceiverCounters, ReceiverOptions } from './receiver.js';

export { CorrelationTable } from './correlation.js';
export { compare, formatDuration, formatMatchLine, formatMissLine } from './comparator.js';
export { deliverReport } from './output.js';
export type { OutputConfig } from './output.js';
export { ComparisonStats } from './stats.js';
export type { StatsSnapshot } from './stats.js';

export { buildShredPacket, formatIdentity, identityKey, parseShredHeader, shredKindOf } from './shred.js';
export type { ShredPacketOptions } from './shred.js';

export { openUdpSocket } from './transport.js';
export type { BoundSocket, DatagramHandlers, SocketOpener } from './transport.js';

export {
  EXIT_CONFIG,
  EXIT_RUNTIME,
  MAX_PORT,
  MAX_TIMER_MS,
  MIN_PORT,
  MONITOR_DEFAULTS,
  SHRED_HEADER_LENGTH,
} from './constants.js';

export { BindError, ConfigError, MalformedPacketError, ReceiveError } from './errors.js';

export type {
  ArrivalRecord,
  Comparison,
  MatchedPair,
  MissReport,
  MonitorConfig,
  Report,
  ResolvedConfig,
  ShredHeader,
  ShredIdentity,
  ShredKind,
  StreamConfig,
  SubmitResult,
} from './types.js';

export { validateConfig } from './validation.js';
