// Local imports
import { BucketConfigError, errorMessage } from './errors';
import { logSuccess, logVerbose, logWarning } from './logger';

// Types
import type { BucketConfigStep } from './errors';
import type { BucketConfigSnapshot, StorageClient } from './types';

/**
 * Run one remote call of the bucket configuration phase, wrapping any
 * failure with the step it belongs to
 */
async function runStep<T>(step: BucketConfigStep, description: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw new BucketConfigError(`Failed to ${description}: ${errorMessage(error)}`, step, { cause: error });
  }
}

/**
 * Ensure the destination bucket exists and carries the source bucket's
 * access policy, versioning state and lifecycle rules.
 *
 * Steps run strictly in order. "Not configured" on the source skips the
 * matching write; any other failure aborts with a BucketConfigError.
 */
export async function syncBucketConfig(
  source: StorageClient,
  destination: StorageClient
): Promise<BucketConfigSnapshot> {
  const created = await runStep(
    'create-bucket',
    `create destination bucket ${destination.bucket}`,
    () => destination.createBucket()
  );

  if (created === 'already-exists') {
    logWarning(`Destination bucket ${destination.bucket} already exists, assuming it belongs to this account`);
  } else {
    logSuccess(`Ensured destination bucket ${destination.bucket} exists`);
  }

  // Access policy
  const policy = await runStep(
    'get-policy',
    `get source bucket policy for ${source.bucket}`,
    () => source.getBucketPolicy()
  );

  if (policy === null) {
    logVerbose(`No bucket policy configured on ${source.bucket}`);
  } else {
    await runStep(
      'put-policy',
      `sync bucket policy for ${destination.bucket}`,
      () => destination.putBucketPolicy(policy)
    );
    logSuccess('Synced bucket policy');
  }

  // Versioning
  const versioning = await runStep(
    'get-versioning',
    `get source bucket versioning for ${source.bucket}`,
    () => source.getBucketVersioning()
  );
  await runStep(
    'put-versioning',
    `sync bucket versioning for ${destination.bucket}`,
    () => destination.putBucketVersioning(versioning)
  );
  logSuccess(`Synced bucket versioning (${versioning})`);

  // Lifecycle rules
  const lifecycleRules = await runStep(
    'get-lifecycle',
    `get source lifecycle configuration for ${source.bucket}`,
    () => source.getBucketLifecycle()
  );

  if (lifecycleRules === null || lifecycleRules.length === 0) {
    logVerbose(`No lifecycle configuration on ${source.bucket}`);
  } else {
    await runStep(
      'put-lifecycle',
      `sync lifecycle rules for ${destination.bucket}`,
      () => destination.putBucketLifecycle(lifecycleRules)
    );
    logSuccess(`Synced ${lifecycleRules.length} lifecycle rules`);
  }

  return { created, policy, versioning, lifecycleRules };
}
