import type { LogBatch } from '@ringwatch/shared';
import { extractNewEntries } from '../runtime/extractor.js';

export interface KernelLogSelection {
  lines: string[];
  /** Highest timestamp seen, undefined when the buffer has none */
  offset: number | undefined;
}

/**
 * Lines for the stateless `dmesg` command. With `since`, only timestamped lines newer
 * than it; without, the whole buffer as-is.
 */
export function selectKernelLines(batch: LogBatch, since?: number): KernelLogSelection {
  if (since !== undefined) {
    const { entries, offset } = extractNewEntries(batch, since);
    return { lines: entries.map((entry) => entry.text), offset };
  }

  let offset: number | undefined;
  for (const { timestamp } of batch) {
    if (timestamp !== undefined && (offset === undefined || timestamp > offset)) {
      offset = timestamp;
    }
  }
  return { lines: batch.map((entry) => entry.text), offset };
}
