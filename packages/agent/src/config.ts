import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  CHECKPOINT_FILE_NAME,
  DEFAULT_OUTPUT_FILE,
  DEFAULT_POLL_INTERVAL_MS,
  MAX_POLL_INTERVAL_MS,
  STATE_DIR_NAME,
} from '@ringwatch/shared';
import { z } from 'zod';
import { errorMessage } from './logger.js';

export const MonitorConfig = z.object({
  /** Directory holding the checkpoint and PID file */
  stateDir: z.string().min(1),
  /** Snapshot document, overwritten every cycle */
  outputFile: z.string().min(1),
  intervalMs: z.number().int().positive().max(MAX_POLL_INTERVAL_MS),
  /** Serve the latest snapshot over HTTP when set */
  serverPort: z.number().int().min(1).max(65535).optional(),
});
export type MonitorConfig = z.infer<typeof MonitorConfig>;

export interface ConfigOverrides {
  stateDir?: string;
  outputFile?: string;
  intervalMs?: number;
  serverPort?: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const PID_FILE_NAME = 'monitor.pid';

export function getDefaultStateDir(): string {
  return path.join(os.homedir(), STATE_DIR_NAME);
}

/**
 * Resolve configuration from CLI overrides, then RINGWATCH_* environment variables,
 * then defaults. Throws ConfigError when the result does not validate.
 */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): MonitorConfig {
  const envIntervalSec = env.RINGWATCH_INTERVAL_SEC || undefined;
  const envPort = env.RINGWATCH_PORT || undefined;

  const candidate = {
    stateDir: path.resolve(overrides.stateDir ?? (env.RINGWATCH_STATE_DIR || getDefaultStateDir())),
    outputFile: path.resolve(overrides.outputFile ?? (env.RINGWATCH_OUTPUT || DEFAULT_OUTPUT_FILE)),
    intervalMs:
      overrides.intervalMs ??
      (envIntervalSec !== undefined ? Number(envIntervalSec) * 1000 : DEFAULT_POLL_INTERVAL_MS),
    serverPort: overrides.serverPort ?? (envPort !== undefined ? Number(envPort) : undefined),
  };

  const result = MonitorConfig.safeParse(candidate);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }
  return result.data;
}

export function getCheckpointPath(stateDir: string): string {
  return path.join(stateDir, CHECKPOINT_FILE_NAME);
}

/** Create the state directory. Failure here is fatal: nothing can be checkpointed. */
export function ensureStateDir(stateDir: string): void {
  try {
    fs.mkdirSync(stateDir, { recursive: true });
  } catch (err: unknown) {
    throw new ConfigError(`Cannot create state directory ${stateDir}: ${errorMessage(err)}`);
  }
}

export function writePidFile(stateDir: string, pid: number): void {
  fs.mkdirSync(stateDir, { recursive: true });
  fs.writeFileSync(path.join(stateDir, PID_FILE_NAME), String(pid), 'utf-8');
}

/**
 * Read PID file and verify the process is still alive.
 * Returns undefined if file missing or process is dead.
 */
export function readPidFile(stateDir: string): number | undefined {
  let raw: string;
  try {
    raw = fs.readFileSync(path.join(stateDir, PID_FILE_NAME), 'utf-8').trim();
  } catch {
    return undefined;
  }

  const pid = Number.parseInt(raw, 10);
  if (Number.isNaN(pid)) return undefined;

  try {
    process.kill(pid, 0);
    return pid;
  } catch {
    // Process is dead, clean up stale PID file
    removePidFile(stateDir);
    return undefined;
  }
}

export function removePidFile(stateDir: string): void {
  fs.rmSync(path.join(stateDir, PID_FILE_NAME), { force: true });
}

/**
 * Stop a running background monitor if one exists.
 * Returns true if a monitor was signalled.
 */
export function stopRunningMonitor(stateDir: string): boolean {
  const pid = readPidFile(stateDir);
  if (pid === undefined) return false;

  try {
    process.kill(pid, 'SIGTERM');
  } catch (err: unknown) {
    removePidFile(stateDir);
    throw new Error(`Cannot signal monitor (PID ${pid}): ${errorMessage(err)}`);
  }
  return true;
}
