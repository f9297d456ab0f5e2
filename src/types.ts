import type { LifecycleRule, StorageClass } from '@aws-sdk/client-s3';

export interface AccountConfig {
  accessKey: string;
  secretKey: string;
  region: string;
  bucket: string;
  // Optional parameters for S3 compatible services
  endpoint?: string;
  forcePathStyle?: boolean;
}

export interface SyncConfig {
  source: AccountConfig;
  destination: AccountConfig;
  concurrency: number;
  maxRetries: number; // Attempts handed to the SDK retry strategy
  // Optional parameters
  prefix?: string;
  include?: string[];
  exclude?: string[];
  skipConfirmation: boolean; // Skip confirmation prompts
  verbose: boolean; // Enable verbose logging
  logFile?: string; // Log file path for saving detailed logs
}

// Outcome of comparing a source object with the destination
export enum SyncDecision {
  ABSENT = 'absent',   // Destination has no object at this key
  STALE = 'stale',     // Destination object differs in size or entity tag
  CURRENT = 'current'  // Destination object matches size and entity tag
}

// Final status of one object within a run
export enum ObjectSyncStatus {
  COPIED = 'copied',
  SKIPPED = 'skipped',
  FAILED = 'failed',
  CANCELLED = 'cancelled' // Never admitted because the run had already failed
}

export interface ObjectDescriptor {
  key: string;
  size: number;
  eTag: string;
}

export interface ObjectHead {
  size: number;
  eTag: string;
  storageClass?: StorageClass;
  metadata: Record<string, string>;
}

export interface ObjectTag {
  key: string;
  value: string;
}

export interface ObjectListPage {
  objects: ObjectDescriptor[];
  nextContinuationToken?: string;
}

export interface CopyObjectRequest {
  sourceBucket: string;
  key: string;
  storageClass?: StorageClass;
}

export type BucketCreateResult = 'created' | 'already-owned' | 'already-exists';

export type VersioningState = 'Enabled' | 'Suspended' | 'Disabled';

/**
 * Operations the sync engine needs from one account and bucket.
 *
 * "Not found" on `headObject` is reported by throwing `ObjectNotFoundError`;
 * "not configured" on the bucket getters is reported as `null`.
 */
export interface StorageClient {
  readonly bucket: string;
  listObjectsPage(continuationToken?: string, prefix?: string): Promise<ObjectListPage>;
  headObject(key: string): Promise<ObjectHead>;
  getObjectTagging(key: string): Promise<ObjectTag[]>;
  copyObject(request: CopyObjectRequest): Promise<void>;
  createBucket(): Promise<BucketCreateResult>;
  getBucketPolicy(): Promise<string | null>;
  putBucketPolicy(policy: string): Promise<void>;
  getBucketVersioning(): Promise<VersioningState>;
  putBucketVersioning(state: VersioningState): Promise<void>;
  getBucketLifecycle(): Promise<LifecycleRule[] | null>;
  putBucketLifecycle(rules: LifecycleRule[]): Promise<void>;
}

export interface SyncCounts {
  copied: number;
  skipped: number;
  failed: number;
  cancelled: number;
}

export interface BucketConfigSnapshot {
  created: BucketCreateResult;
  policy: string | null;
  versioning: VersioningState;
  lifecycleRules: LifecycleRule[] | null;
}
