import { percentOf } from '../format.js';
import type { ExecFn } from '../types.js';

export interface FilesystemSpace {
  filesystem: string;
  sizeKb: number;
  availableKb: number;
  mountedOn: string;
}

const PSEUDO_FILESYSTEMS = new Set(['tmpfs', 'devtmpfs', 'none', 'udev']);

/**
 * Runs `df -kP` (1K blocks, one POSIX line per filesystem) and returns the used share
 * of all real filesystems together. Used space counts reserved blocks, as size - available.
 */
export async function collectDiskUsage(exec: ExecFn): Promise<number> {
  const stdout = await exec('df', ['-kP']);
  return diskUsagePercent(parseDfOutput(stdout));
}

export function parseDfOutput(stdout: string): FilesystemSpace[] {
  // Skip header line
  const dataLines = stdout.trim().split('\n').slice(1);
  const filesystems: FilesystemSpace[] = [];

  for (const line of dataLines) {
    const [filesystem, sizeStr, , availStr, , ...mount] = line.trim().split(/\s+/);
    if (!filesystem || !sizeStr || !availStr || mount.length === 0) continue;
    if (PSEUDO_FILESYSTEMS.has(filesystem)) continue;

    const sizeKb = Number(sizeStr);
    const availableKb = Number(availStr);
    if (Number.isNaN(sizeKb) || Number.isNaN(availableKb)) continue;

    filesystems.push({ filesystem, sizeKb, availableKb, mountedOn: mount.join(' ') });
  }

  return filesystems;
}

export function diskUsagePercent(filesystems: readonly FilesystemSpace[]): number {
  let size = 0;
  let used = 0;
  for (const entry of filesystems) {
    size += entry.sizeKb;
    used += Math.max(0, entry.sizeKb - entry.availableKb);
  }
  return percentOf(used, size);
}
