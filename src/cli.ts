#!/usr/bin/env node
/**
 * Process entrypoint: parse flags/env, validate, start both receivers, run until SIGINT/SIGTERM.
 * Exit codes: 0 = clean shutdown, EXIT_CONFIG (1) = bad arguments or config, EXIT_RUNTIME (2) = bind failure, every receiver failed, or stop failure.
 */

import { parseArgs } from './args.js';
import { EXIT_CONFIG, EXIT_RUNTIME } from './constants.js';
import { BindError, ConfigError } from './errors.js';
import { logError, logInfo } from './logger.js';
import { createMonitor } from './monitor.js';
import type { MonitorConfig } from './types.js';
import { validateConfig } from './validation.js';

/** Returns the config to run with, or the exit code to stop with. */
function loadConfig(): MonitorConfig | number {
  try {
    const parsed = parseArgs(process.argv.slice(2));
    if (parsed.kind === 'exit') return parsed.code;
    validateConfig(parsed.config);
    return parsed.config;
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    logError('Invalid config: ' + err.message, err.field ? { field: err.field } : undefined);
    return EXIT_CONFIG;
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  if (typeof config === 'number') {
    process.exitCode = config;
    return;
  }

  const monitor = createMonitor(config, {
    onFailed: (err) => {
      logError('Aborting: every stream receiver failed', { err: String(err) });
      process.exit(EXIT_RUNTIME);
    },
  });

  function shutdown(signal: string): void {
    logInfo(`Received ${signal}, stopping monitor`);
    monitor
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logError('Error during stop', { err: String(err) });
        process.exit(EXIT_RUNTIME);
      });
  }

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));

  try {
    await monitor.start();
  } catch (err) {
    const reason = err instanceof BindError ? 'could not bind stream socket' : 'monitor start failed';
    logError(`Aborting: ${reason}`, { err: String(err) });
    process.exit(EXIT_RUNTIME);
  }
}

main().catch((err: unknown) => {
  logError('Entrypoint failed', { err: String(err) });
  process.exit(EXIT_RUNTIME);
});
