import type { HostIdentity, LogEntry, ResourceSummary } from '@ringwatch/shared';
import { Snapshot } from '@ringwatch/shared';

export interface SnapshotInput {
  identity: HostIdentity;
  resources: ResourceSummary;
  entries: readonly LogEntry[];
  now: Date;
  /** Offset from UTC in minutes; the host's local offset when omitted */
  utcOffsetMinutes?: number;
}

export function assembleSnapshot(input: SnapshotInput): Snapshot {
  return {
    hostname: input.identity.hostname,
    ip_address: input.identity.ipAddress,
    timestamp: formatTimestamp(input.now, input.utcOffsetMinutes),
    system_metrics: {
      cpu_info: input.resources.cpuInfo,
      memory_info: input.resources.memoryInfo,
      swap_info: input.resources.swapInfo,
      threadinfo: '',
    },
    logs: {
      dmesg: input.entries.map((entry) => entry.text).join('\n'),
    },
  };
}

/** ISO-8601 at second precision with a `±HH:MM` suffix, e.g. `2024-01-15T10:00:01+02:00` */
export function formatTimestamp(
  date: Date,
  offsetMinutes: number = -date.getTimezoneOffset(),
): string {
  const shifted = new Date(date.getTime() + offsetMinutes * 60_000);
  const wallClock = shifted.toISOString().slice(0, 19);

  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  const hours = String(Math.floor(abs / 60)).padStart(2, '0');
  const minutes = String(abs % 60).padStart(2, '0');

  return `${wallClock}${sign}${hours}:${minutes}`;
}

/** Validate and render the document; JSON escaping covers quotes, backslashes and control characters */
export function serializeSnapshot(snapshot: Snapshot): string {
  return `${JSON.stringify(Snapshot.parse(snapshot), null, 2)}\n`;
}
