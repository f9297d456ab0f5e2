// Types
import type { ObjectDescriptor } from './types';

export enum SyncPhase {
  CONFIG = 'config',
  BUCKET_CONFIG = 'bucket-config',
  LISTING = 'listing',
  CONFIRMATION = 'confirmation',
  OBJECT = 'object',
}

export type BucketConfigStep =
  | 'create-bucket'
  | 'get-policy'
  | 'put-policy'
  | 'get-versioning'
  | 'put-versioning'
  | 'get-lifecycle'
  | 'put-lifecycle';

export type ObjectSyncStep =
  | 'head-destination'
  | 'head-source'
  | 'get-tags'
  | 'copy'
  | 'verify'
  // Thrown outside any storage call of the unit
  | 'unexpected';

/**
 * Base class for every failure that stops a run. `phase` tells the caller
 * where the run stopped.
 */
export class SyncError extends Error {
  constructor(message: string, readonly phase: SyncPhase, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SyncError';
  }
}

/**
 * Unreadable, unparseable or invalid configuration. Raised before any
 * synchronization starts.
 */
export class ConfigError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, SyncPhase.CONFIG, options);
    this.name = 'ConfigError';
  }
}

export class BucketConfigError extends SyncError {
  constructor(message: string, readonly step: BucketConfigStep, options?: { cause?: unknown }) {
    super(message, SyncPhase.BUCKET_CONFIG, options);
    this.name = 'BucketConfigError';
  }
}

export class ListingError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, SyncPhase.LISTING, options);
    this.name = 'ListingError';
  }
}

export class ObjectSyncError extends SyncError {
  constructor(
    message: string,
    readonly key: string,
    readonly step: ObjectSyncStep,
    options?: { cause?: unknown }
  ) {
    super(message, SyncPhase.OBJECT, options);
    this.name = 'ObjectSyncError';
  }
}

/**
 * The destination object observed after a copy does not match the source
 * values recorded at listing time.
 */
export class VerificationError extends ObjectSyncError {
  constructor(
    readonly expected: Pick<ObjectDescriptor, 'size' | 'eTag'>,
    readonly actual: Pick<ObjectDescriptor, 'size' | 'eTag'>,
    key: string
  ) {
    super(
      `Verification failed for object ${key}: size (source: ${expected.size}, dest: ${actual.size}), ` +
        `ETag (source: ${expected.eTag}, dest: ${actual.eTag})`,
      key,
      'verify'
    );
    this.name = 'VerificationError';
  }
}

/**
 * Raised by a storage client when a head request finds no object at the key.
 */
export class ObjectNotFoundError extends Error {
  constructor(readonly bucket: string, readonly key: string, options?: { cause?: unknown }) {
    super(`Object ${key} not found in bucket ${bucket}`, options);
    this.name = 'ObjectNotFoundError';
  }
}

/**
 * Extract a printable message from any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
