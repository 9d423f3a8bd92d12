import fs from 'node:fs';
import { Checkpoint, EMPTY_CHECKPOINT } from '@ringwatch/shared';
import { errorMessage, logger } from '../logger.js';

export interface CheckpointStore {
  /** Never throws: missing or unreadable state yields the empty checkpoint. */
  load(): Checkpoint;
  /** Throws CheckpointStoreError when the record cannot be written. */
  save(checkpoint: Checkpoint): void;
}

export class CheckpointStoreError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed to write checkpoint to ${path}: ${errorMessage(cause)}`, { cause });
    this.name = 'CheckpointStoreError';
    this.path = path;
  }
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Checkpoint persisted as a small JSON document. Writes go to a sibling temp file
 * that is renamed over the target, so a reader never sees a half-written record.
 */
export class FileCheckpointStore implements CheckpointStore {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  load(): Checkpoint {
    let raw: string;
    try {
      raw = fs.readFileSync(this.path, 'utf-8');
    } catch (err: unknown) {
      if (errorCode(err) !== 'ENOENT') {
        logger.warn({ path: this.path, err: errorMessage(err) }, 'Cannot read checkpoint, starting empty');
      }
      return { ...EMPTY_CHECKPOINT };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err: unknown) {
      logger.warn({ path: this.path, err: errorMessage(err) }, 'Checkpoint corrupted, starting empty');
      return { ...EMPTY_CHECKPOINT };
    }

    const result = Checkpoint.safeParse(parsed);
    if (!result.success) {
      logger.warn(
        { path: this.path, issues: result.error.issues.map((i) => i.message) },
        'Checkpoint has unexpected shape, starting empty',
      );
      return { ...EMPTY_CHECKPOINT };
    }
    return result.data;
  }

  save(checkpoint: Checkpoint): void {
    const tmpPath = `${this.path}.tmp`;
    try {
      fs.writeFileSync(tmpPath, `${JSON.stringify(checkpoint, null, 2)}\n`, 'utf-8');
      fs.renameSync(tmpPath, this.path);
    } catch (err: unknown) {
      throw new CheckpointStoreError(this.path, err);
    }
  }
}
