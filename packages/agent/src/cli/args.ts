import { MAX_POLL_INTERVAL_MS } from '@ringwatch/shared';
import { ConfigError, type ConfigOverrides } from '../config.js';

export function hasFlag(args: readonly string[], flag: string): boolean {
  return args.includes(flag);
}

export function getArg(args: readonly string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return undefined;
  return args[idx + 1];
}

function parseNumberArg(args: readonly string[], flag: string): number | undefined {
  const raw = getArg(args, flag);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ConfigError(`${flag} expects a number, got "${raw}"`);
  }
  return value;
}

/** Interval from `--min` and `--sec` (summed). Undefined when neither flag is given. */
export function parseIntervalMs(args: readonly string[]): number | undefined {
  const minutes = parseNumberArg(args, '--min');
  const seconds = parseNumberArg(args, '--sec');
  if (minutes === undefined && seconds === undefined) return undefined;

  const totalSec = (minutes ?? 0) * 60 + (seconds ?? 0);
  if (totalSec <= 0) {
    throw new ConfigError('Please specify a positive interval using --min or --sec');
  }
  const intervalMs = Math.round(totalSec * 1000);
  if (intervalMs > MAX_POLL_INTERVAL_MS) {
    throw new ConfigError(`Interval too long: at most ${Math.floor(MAX_POLL_INTERVAL_MS / 1000)} seconds`);
  }
  return intervalMs;
}

export function parseSince(args: readonly string[]): number | undefined {
  const since = parseNumberArg(args, '--since');
  if (since !== undefined && since < 0) {
    throw new ConfigError('--since must not be negative');
  }
  return since;
}

/** Monitor flags mapped onto config overrides */
export function parseMonitorOverrides(args: readonly string[]): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  const stateDir = getArg(args, '--state-dir');
  const outputFile = getArg(args, '--output');
  const intervalMs = parseIntervalMs(args);
  const serverPort = parseNumberArg(args, '--server');

  if (stateDir !== undefined) overrides.stateDir = stateDir;
  if (outputFile !== undefined) overrides.outputFile = outputFile;
  if (intervalMs !== undefined) overrides.intervalMs = intervalMs;
  if (serverPort !== undefined) overrides.serverPort = serverPort;
  return overrides;
}
