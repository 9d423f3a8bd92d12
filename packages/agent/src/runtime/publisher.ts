import fs from 'node:fs';
import { rename, writeFile } from 'node:fs/promises';
import { Snapshot } from '@ringwatch/shared';
import { serializeSnapshot } from './assembler.js';

export interface SnapshotSink {
  /** Where snapshots end up, for operator feedback */
  readonly location: string;
  publish(snapshot: Snapshot): Promise<void>;
}

/** Overwrites a single file each cycle via temp file + rename */
export class FileSnapshotSink implements SnapshotSink {
  readonly location: string;

  constructor(path: string) {
    this.location = path;
  }

  async publish(snapshot: Snapshot): Promise<void> {
    const body = serializeSnapshot(snapshot);
    const tmpPath = `${this.location}.tmp`;
    await writeFile(tmpPath, body, 'utf-8');
    await rename(tmpPath, this.location);
  }
}

/** Last published snapshot, or undefined when the file is missing or not a valid snapshot */
export function readPublishedSnapshot(path: string): Snapshot | undefined {
  let raw: string;
  try {
    raw = fs.readFileSync(path, 'utf-8');
  } catch {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }

  const result = Snapshot.safeParse(parsed);
  return result.success ? result.data : undefined;
}
