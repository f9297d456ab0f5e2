// Local imports
import { copyAndVerifyObject } from './copy-verify';
import { detectChange } from './change-detector';
import { errorMessage, ObjectSyncError } from './errors';
import { logError, logVerbose } from './logger';
import { ObjectSyncStatus, SyncDecision } from './types';

// Types
import type { ProgressReporter } from './progress';
import type { ObjectDescriptor, StorageClient, SyncCounts } from './types';

/**
 * Counting admission gate. At most `capacity` holders at a time; once
 * closed, queued and future callers are turned away instead of admitted.
 */
export class AdmissionGate {
  private holders = 0;
  private closed = false;
  private readonly waiters: Array<(admitted: boolean) => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Admission gate capacity must be a positive integer, got ${capacity}`);
    }
  }

  get active(): number {
    return this.holders;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Resolves true once a slot is held, false if the gate was closed first
   */
  acquire(): Promise<boolean> {
    if (this.closed) {
      return Promise.resolve(false);
    }

    if (this.holders < this.capacity) {
      this.holders++;
      return Promise.resolve(true);
    }

    return new Promise<boolean>(resolve => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    if (this.holders === 0) {
      throw new Error('Admission gate released more times than acquired');
    }

    const next = this.closed ? undefined : this.waiters.shift();
    if (next) {
      // Slot passes straight to the next waiter
      next(true);
      return;
    }

    this.holders--;
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(false);
    }
  }
}

/**
 * Run-wide outcome counters. Units only ever record an outcome; the totals
 * are read back through a snapshot.
 */
export class SyncStats {
  private readonly counts: SyncCounts = {
    copied: 0,
    skipped: 0,
    failed: 0,
    cancelled: 0,
  };

  record(status: ObjectSyncStatus): void {
    switch (status) {
      case ObjectSyncStatus.COPIED:
        this.counts.copied++;
        break;
      case ObjectSyncStatus.SKIPPED:
        this.counts.skipped++;
        break;
      case ObjectSyncStatus.FAILED:
        this.counts.failed++;
        break;
      case ObjectSyncStatus.CANCELLED:
        this.counts.cancelled++;
        break;
    }
  }

  snapshot(): SyncCounts {
    return { ...this.counts };
  }
}

export interface ObjectSyncOptions {
  source: StorageClient;
  destination: StorageClient;
  objects: readonly ObjectDescriptor[];
  concurrency: number;
  progress: ProgressReporter;
}

export interface ObjectSyncOutcome {
  counts: SyncCounts;
  error?: ObjectSyncError;
}

/**
 * Decide and, when needed, copy a single object
 */
export async function syncObject(
  source: StorageClient,
  destination: StorageClient,
  object: ObjectDescriptor
): Promise<ObjectSyncStatus.COPIED | ObjectSyncStatus.SKIPPED> {
  const detection = await detectChange(destination, object);

  if (detection.decision === SyncDecision.CURRENT) {
    logVerbose(`Object ${object.key} is up-to-date, skipping`);
    return ObjectSyncStatus.SKIPPED;
  }

  if (detection.decision === SyncDecision.STALE) {
    logVerbose(
      `Object ${object.key} changed (dest size ${detection.destination.size}, ETag ${detection.destination.eTag}), copying`
    );
  } else {
    logVerbose(`Object ${object.key} not found in destination, copying`);
  }

  await copyAndVerifyObject(source, destination, object);
  return ObjectSyncStatus.COPIED;
}

function toObjectSyncError(key: string, error: unknown): ObjectSyncError {
  if (error instanceof ObjectSyncError) {
    return error;
  }
  return new ObjectSyncError(
    `Unexpected failure while syncing object ${key}: ${errorMessage(error)}`,
    key,
    'unexpected',
    { cause: error }
  );
}

/**
 * Run one unit of work per object behind an admission gate of `concurrency`
 * slots.
 *
 * The first failure becomes the outcome's error and closes the gate: units
 * already admitted finish and are counted, units still waiting are counted
 * as cancelled.
 */
export async function syncObjects(options: ObjectSyncOptions): Promise<ObjectSyncOutcome> {
  const { source, destination, objects, progress } = options;
  const gate = new AdmissionGate(options.concurrency);
  const stats = new SyncStats();
  let firstError: ObjectSyncError | undefined;

  const runUnit = async (object: ObjectDescriptor): Promise<void> => {
    const admitted = await gate.acquire();
    if (!admitted) {
      stats.record(ObjectSyncStatus.CANCELLED);
      return;
    }

    let status: ObjectSyncStatus.COPIED | ObjectSyncStatus.SKIPPED;
    try {
      status = await syncObject(source, destination, object);
    } catch (error) {
      const failure = toObjectSyncError(object.key, error);
      stats.record(ObjectSyncStatus.FAILED);
      logError(failure.message, failure);

      if (!firstError) {
        firstError = failure;
        gate.close();
      }
      return;
    } finally {
      gate.release();
    }

    stats.record(status);
    progress.increment();
  };

  await Promise.all(objects.map(runUnit));

  return firstError ? { counts: stats.snapshot(), error: firstError } : { counts: stats.snapshot() };
}
