import { defaultReadFile } from '../exec.js';
import type { ReadFileFn } from '../types.js';

/** systemd location first, then the copy older D-Bus installs keep */
export const MACHINE_ID_PATHS = ['/etc/machine-id', '/var/lib/dbus/machine-id'] as const;

const UNKNOWN = 'unknown';

export async function readMachineId(readFile: ReadFileFn = defaultReadFile): Promise<string> {
  for (const path of MACHINE_ID_PATHS) {
    let id: string;
    try {
      id = (await readFile(path)).trim();
    } catch {
      continue;
    }
    if (id) return id;
  }
  return UNKNOWN;
}

/** Stable per-host id: `<hostname>-<first 8 chars of the machine id>` */
export function buildServerId(hostname: string, machineId: string): string {
  return `${hostname || UNKNOWN}-${machineId.slice(0, 8)}`;
}
