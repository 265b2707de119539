/**
 * Command-line parsing. Every flag falls back to an environment variable so the
 * monitor can also be configured from environment variables.
 */

import { Command, CommanderError } from 'commander';
import { ConfigError } from './errors.js';
import type { MonitorConfig } from './types.js';

export type CliOptions = {
  name0?: string;
  port0?: string;
  name1?: string;
  port1?: string;
  timeoutSecs?: string;
  statsIntervalSecs?: string;
  host?: string;
};

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

/** NaN for anything that is not a plain decimal number, so validation rejects it. */
function toNumber(value: string | undefined): number {
  if (value === undefined || !/^\d+(\.\d+)?$/.test(value)) return Number.NaN;
  return Number(value);
}

function secondsToMs(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Math.round(toNumber(value) * 1000);
}

export function buildProgram(): Command {
  return new Command()
    .name('shredrace')
    .description('Report which of two UDP shred feeds delivers each shred first')
    .option('--name-0 <name>', 'name of the first stream (env NAME_0)')
    .option('--port-0 <port>', 'UDP port of the first stream (env PORT_0)')
    .option('--name-1 <name>', 'name of the second stream (env NAME_1)')
    .option('--port-1 <port>', 'UDP port of the second stream (env PORT_1)')
    .option('--timeout-secs <secs>', 'evict unmatched shreds after this many seconds (env TIMEOUT_SECS)')
    .option('--stats-interval-secs <secs>', 'seconds between stats lines, 0 to disable (env STATS_INTERVAL_SECS)')
    .option('--host <address>', 'bind address for both sockets (env BIND_HOST)')
    .exitOverride()
    .configureOutput({
      writeErr: (str) => process.stdout.write(str),
    });
}

/** Merges parsed flags with environment fallbacks into a MonitorConfig (not yet validated). */
export function configFromOptions(opts: CliOptions, env: Env): MonitorConfig {
  const pick = (flag: string | undefined, key: string): string | undefined =>
    nonEmpty(flag) ?? nonEmpty(env[key]);
  return {
    streams: [
      { name: pick(opts.name0, 'NAME_0') ?? '', port: toNumber(pick(opts.port0, 'PORT_0')) },
      { name: pick(opts.name1, 'NAME_1') ?? '', port: toNumber(pick(opts.port1, 'PORT_1')) },
    ],
    evictAfterMs: secondsToMs(pick(opts.timeoutSecs, 'TIMEOUT_SECS')),
    statsIntervalMs: secondsToMs(pick(opts.statsIntervalSecs, 'STATS_INTERVAL_SECS')),
    host: pick(opts.host, 'BIND_HOST'),
  };
}

export type ParseOutcome = { kind: 'config'; config: MonitorConfig } | { kind: 'exit'; code: number };

/**
 * Parses argv (user arguments only, without node and script path).
 * --help and --version resolve to an exit outcome; unknown flags throw ConfigError.
 */
export function parseArgs(argv: string[], env: Env = process.env): ParseOutcome {
  const program = buildProgram();
  try {
    program.parse(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        return { kind: 'exit', code: 0 };
      }
      throw new ConfigError(err.message);
    }
    throw err;
  }
  return { kind: 'config', config: configFromOptions(program.opts<CliOptions>(), env) };
}
