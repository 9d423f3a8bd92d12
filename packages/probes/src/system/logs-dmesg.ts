import type { LogBatch, LogEntry } from '@ringwatch/shared';
import type { ExecFn } from '../types.js';

/** `[    4.396920] message`: bracket, optional padding, seconds.fraction */
const TIMESTAMP_RE = /^\[\s*(\d+\.\d+)/;

/**
 * Reads the whole kernel ring buffer via `dmesg`. Every call returns the full
 * retained buffer; narrowing it down to new lines is the caller's job.
 */
export async function readKernelLog(exec: ExecFn): Promise<LogBatch> {
  const output = await exec('dmesg', ['--color=never']);
  return parseDmesgOutput(output);
}

export function parseDmesgOutput(raw: string): LogBatch {
  return raw
    .split('\n')
    .filter(Boolean)
    .map(parseLogLine);
}

export function parseLogLine(line: string): LogEntry {
  const timestamp = parseLogTimestamp(line);
  return timestamp === undefined ? { text: line } : { timestamp, text: line };
}

/** Relative timestamp in seconds, or undefined for continuation and foreign-format lines */
export function parseLogTimestamp(line: string): number | undefined {
  const match = TIMESTAMP_RE.exec(line);
  if (!match?.[1]) return undefined;
  return Number(match[1]);
}
