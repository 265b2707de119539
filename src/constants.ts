/** Exit code: configuration or argument error (bad name, bad or duplicate port). */
export const EXIT_CONFIG = 1;
/** Exit code: runtime fatal error (bind failed, every receiver failed, or error during stop). */
export const EXIT_RUNTIME = 2;

/**
 * Defaults applied by validateConfig when the caller leaves a field out.
 */
export const MONITOR_DEFAULTS = {
  /** Pending shreds older than this are evicted and reported as misses. */
  evictAfterMs: 60_000,
  /** Interval of the periodic stats line; 0 disables it. */
  statsIntervalMs: 10_000,
  host: '0.0.0.0',
} as const;

/** Unprivileged port range accepted for stream ports. */
export const MIN_PORT = 1024;
export const MAX_PORT = 65_535;

/** Largest delay setInterval honours; longer ones fire after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;

/** Bounds for the eviction sweep timer. */
export const MIN_SWEEP_INTERVAL_MS = 10;
export const MAX_SWEEP_INTERVAL_MS = 1000;

// Common shred header layout (little-endian).
export const SHRED_VARIANT_OFFSET = 64;
export const SHRED_SLOT_OFFSET = 65;
export const SHRED_INDEX_OFFSET = 73;
export const SHRED_VERSION_OFFSET = 77;
export const SHRED_FEC_SET_INDEX_OFFSET = 79;
export const SHRED_HEADER_LENGTH = 83;

export const LEGACY_DATA_VARIANT = 0xa5;
export const LEGACY_CODE_VARIANT = 0x5a;
