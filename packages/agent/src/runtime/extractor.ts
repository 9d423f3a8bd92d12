import type { LogEntry } from '@ringwatch/shared';

export interface Extraction {
  /** Timestamped entries newer than the previous watermark, in buffer order */
  entries: LogEntry[];
  /** New watermark: the larger of the previous one and every timestamp seen */
  offset: number;
}

/**
 * Turn a full ring-buffer read into the delta since `lastOffset`.
 *
 * Eligibility is judged against `lastOffset` alone, never against entries of the same
 * batch, so out-of-order timestamps are all emitted and the watermark is their maximum.
 * Equal timestamps are not new. Untimestamped lines are neither emitted nor counted.
 */
export function extractNewEntries(batch: readonly LogEntry[], lastOffset: number): Extraction {
  const entries: LogEntry[] = [];
  let offset = lastOffset;

  for (const entry of batch) {
    const { timestamp } = entry;
    if (timestamp === undefined) continue;

    if (timestamp > lastOffset) {
      entries.push(entry);
    }
    if (timestamp > offset) {
      offset = timestamp;
    }
  }

  return { entries, offset };
}
