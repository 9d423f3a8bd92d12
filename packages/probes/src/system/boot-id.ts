import { UNKNOWN_BOOT_ID } from '@ringwatch/shared';
import { defaultReadFile } from '../exec.js';
import type { ReadFileFn } from '../types.js';

export const BOOT_ID_PATH = '/proc/sys/kernel/random/boot_id';

/**
 * Reads the kernel's per-boot identifier. Hosts that hide it (containers, non-Linux)
 * get the `unknown` sentinel instead of an error.
 */
export async function readBootId(readFile: ReadFileFn = defaultReadFile): Promise<string> {
  let raw: string;
  try {
    raw = await readFile(BOOT_ID_PATH);
  } catch {
    return UNKNOWN_BOOT_ID;
  }
  return normalizeBootId(raw);
}

export function normalizeBootId(raw: string): string {
  const id = raw.trim();
  return id === '' ? UNKNOWN_BOOT_ID : id;
}
