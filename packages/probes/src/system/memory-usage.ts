import { percentOf } from '../format.js';
import type { ExecFn } from '../types.js';

export interface MemoryTotals {
  totalBytes: number;
  availableBytes: number;
}

/** Runs `free -b` (byte units) and returns the share of memory not available to new work */
export async function collectMemoryUsage(exec: ExecFn): Promise<number> {
  const stdout = await exec('free', ['-b']);
  return memoryUsagePercent(parseFreeOutput(stdout));
}

export function parseFreeOutput(stdout: string): MemoryTotals {
  for (const line of stdout.trim().split('\n')) {
    const parts = line.trim().split(/\s+/);
    if (parts[0]?.toLowerCase() !== 'mem:') continue;

    const totalBytes = Number(parts[1]);
    // "available" is the last column in modern `free` output
    const availableBytes = Number(parts[parts.length - 1]);
    return {
      totalBytes: Number.isFinite(totalBytes) ? totalBytes : 0,
      availableBytes: Number.isFinite(availableBytes) ? availableBytes : 0,
    };
  }
  return { totalBytes: 0, availableBytes: 0 };
}

export function memoryUsagePercent(totals: MemoryTotals): number {
  return percentOf(totals.totalBytes - totals.availableBytes, totals.totalBytes);
}
