import { roundTenths } from '../format.js';
import type { ReadFileFn } from '../types.js';

export const DISKSTATS_PATH = '/proc/diskstats';

const SECTOR_BYTES = 512;
const MB = 1024 * 1024;

export interface DiskIo {
  readMb: number;
  writeMb: number;
}

/** Whole disks only: partitions would count the same sectors twice */
export function isWholeDisk(device: string): boolean {
  if (/^(nvme\d+n\d+|mmcblk\d+)$/.test(device)) return true;
  return !/\d$/.test(device);
}

/**
 * Sectors read and written since boot, from /proc/diskstats columns 6 and 10.
 * A host without the file reports zero traffic.
 */
export async function collectDiskIo(readFile: ReadFileFn): Promise<DiskIo> {
  let raw: string;
  try {
    raw = await readFile(DISKSTATS_PATH);
  } catch {
    return { readMb: 0, writeMb: 0 };
  }
  return parseDiskStats(raw);
}

export function parseDiskStats(raw: string): DiskIo {
  let readSectors = 0;
  let writeSectors = 0;

  for (const line of raw.split('\n')) {
    const parts = line.trim().split(/\s+/);
    if (parts.length < 14) continue;

    const device = parts[2];
    if (device === undefined || !isWholeDisk(device)) continue;

    const read = Number(parts[5]);
    const written = Number(parts[9]);
    if (Number.isNaN(read) || Number.isNaN(written)) continue;

    readSectors += read;
    writeSectors += written;
  }

  return {
    readMb: roundTenths((readSectors * SECTOR_BYTES) / MB),
    writeMb: roundTenths((writeSectors * SECTOR_BYTES) / MB),
  };
}
