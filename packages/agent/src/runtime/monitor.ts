import {
  type BootIdSource,
  type Checkpoint,
  DEFAULT_POLL_INTERVAL_MS,
  type HostIdentity,
  type LogBatch,
  type LogSource,
  type ResourceSummary,
  type Snapshot,
  type SnapshotProvider,
  UNKNOWN_BOOT_ID,
} from '@ringwatch/shared';
import { errorMessage, logger } from '../logger.js';
import { assembleSnapshot } from './assembler.js';
import type { CheckpointStore } from './checkpoint-store.js';
import { extractNewEntries } from './extractor.js';
import type { SnapshotSink } from './publisher.js';
import { detectReboot } from './reboot-detector.js';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface MonitorDeps {
  store: CheckpointStore;
  sink: SnapshotSink;
  bootIds: BootIdSource;
  logs: LogSource;
  host: SnapshotProvider;
  intervalMs?: number;
  sleep?: SleepFn;
  now?: () => Date;
}

export interface CycleResult {
  rebooted: boolean;
  newEntries: number;
  offset: number;
  checkpointSaved: boolean;
  published: boolean;
  snapshot: Snapshot;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Stop after this many cycles; unbounded when omitted */
  maxCycles?: number;
}

const EMPTY_IDENTITY: HostIdentity = { hostname: '', ipAddress: '' };
const EMPTY_RESOURCES: ResourceSummary = { cpuInfo: '', memoryInfo: '', swapInfo: '' };

/** Resolves after `ms`, or immediately once `signal` aborts */
export const sleep: SleepFn = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Drives the poll cycle: load checkpoint, detect reboot, read the full kernel log,
 * extract the delta, persist the watermark, assemble and publish the snapshot.
 * Collaborator failures degrade to placeholders; nothing inside a cycle is fatal.
 */
export class Monitor {
  private readonly store: CheckpointStore;
  private readonly sink: SnapshotSink;
  private readonly bootIds: BootIdSource;
  private readonly logs: LogSource;
  private readonly host: SnapshotProvider;
  private readonly intervalMs: number;
  private readonly sleep: SleepFn;
  private readonly now: () => Date;
  /** Checkpoint whose save failed; takes precedence over the store until written */
  private unsaved: Checkpoint | undefined;

  constructor(deps: MonitorDeps) {
    this.store = deps.store;
    this.sink = deps.sink;
    this.bootIds = deps.bootIds;
    this.logs = deps.logs;
    this.host = deps.host;
    this.intervalMs = deps.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.sleep = deps.sleep ?? sleep;
    this.now = deps.now ?? (() => new Date());
  }

  async runCycle(): Promise<CycleResult> {
    const stored = this.unsaved ?? this.store.load();

    const bootId = await this.orPlaceholder('boot id', () => this.bootIds.readBootId(), UNKNOWN_BOOT_ID);
    const { checkpoint, rebooted } = detectReboot(bootId, stored);
    if (rebooted) {
      logger.info(
        { previousBootId: stored.bootId, bootId: checkpoint.bootId },
        'System reboot detected (boot id changed), resetting kernel log offset',
      );
    }

    const batch = await this.orPlaceholder<LogBatch>('kernel log', () => this.logs.readLogs(), []);
    const { entries, offset } = extractNewEntries(batch, checkpoint.lastLogOffset);

    let checkpointSaved = false;
    if (rebooted || offset > checkpoint.lastLogOffset || this.unsaved !== undefined) {
      checkpointSaved = this.persist({ bootId: checkpoint.bootId, lastLogOffset: offset });
    }

    const [identity, resources] = await Promise.all([
      this.orPlaceholder('host identity', () => this.host.collectIdentity(), EMPTY_IDENTITY),
      this.orPlaceholder('resource summary', () => this.host.collectResources(), EMPTY_RESOURCES),
    ]);
    const snapshot = assembleSnapshot({ identity, resources, entries, now: this.now() });

    let published = false;
    try {
      await this.sink.publish(snapshot);
      published = true;
      logger.info(
        { output: this.sink.location, newEntries: entries.length, offset },
        'Snapshot published',
      );
    } catch (err: unknown) {
      logger.warn({ output: this.sink.location, err: errorMessage(err) }, 'Snapshot not published');
    }

    return { rebooted, newEntries: entries.length, offset, checkpointSaved, published, snapshot };
  }

  /** Run cycles back to back with `intervalMs` between them. Resolves with the cycle count. */
  async run(options: RunOptions = {}): Promise<number> {
    const { signal, maxCycles } = options;
    let cycles = 0;

    while (!signal?.aborted) {
      await this.runCycle();
      cycles++;
      if (maxCycles !== undefined && cycles >= maxCycles) break;
      await this.sleep(this.intervalMs, signal);
    }

    return cycles;
  }

  private persist(next: Checkpoint): boolean {
    try {
      this.store.save(next);
      this.unsaved = undefined;
      return true;
    } catch (err: unknown) {
      this.unsaved = next;
      logger.warn({ err: errorMessage(err) }, 'Checkpoint not saved, retrying next cycle');
      return false;
    }
  }

  private async orPlaceholder<T>(what: string, read: () => Promise<T>, placeholder: T): Promise<T> {
    try {
      return await read();
    } catch (err: unknown) {
      logger.warn({ err: errorMessage(err) }, `${what} unavailable, using placeholder`);
      return placeholder;
    }
  }
}
