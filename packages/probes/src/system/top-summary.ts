import type { ResourceSummary } from '@ringwatch/shared';
import type { ExecFn } from '../types.js';

/** Summary lines live in the header block of `top` batch output */
const TOP_HEADER_LINES = 10;

/**
 * Runs `top -b -n 1` and keeps the CPU, memory and swap summary lines verbatim.
 * Lines that are not found come back as empty strings.
 */
export async function collectTopSummary(exec: ExecFn): Promise<ResourceSummary> {
  const stdout = await exec('top', ['-b', '-n', '1']);
  return parseTopOutput(stdout);
}

export function parseTopOutput(stdout: string): ResourceSummary {
  const header = stdout.split('\n').slice(0, TOP_HEADER_LINES);
  const firstMatching = (match: (line: string) => boolean): string => header.find(match) ?? '';

  return {
    cpuInfo: firstMatching((line) => line.startsWith('%Cpu')),
    memoryInfo: firstMatching((line) => line.includes('Mem :')),
    swapInfo: firstMatching((line) => line.includes('Swap:')),
  };
}
