// Local imports
import { errorMessage, ObjectSyncError, VerificationError } from './errors';
import { logVerbose } from './logger';

// Types
import type { ObjectSyncStep } from './errors';
import type { ObjectDescriptor, StorageClient } from './types';

async function step<T>(key: string, name: ObjectSyncStep, description: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw new ObjectSyncError(`Failed to ${description} ${key}: ${errorMessage(error)}`, key, name, {
      cause: error,
    });
  }
}

/**
 * Copy one object server side, preserving metadata, tags and storage class,
 * then head the destination and check that size and entity tag match the
 * values recorded for the source when it was listed.
 *
 * The copy request succeeding is not enough; only a matching re-head counts.
 */
export async function copyAndVerifyObject(
  source: StorageClient,
  destination: StorageClient,
  object: ObjectDescriptor
): Promise<void> {
  const { key } = object;

  const sourceHead = await step(key, 'head-source', 'head source object', () => source.headObject(key));
  const tags = await step(key, 'get-tags', 'get source object tags for', () => source.getObjectTagging(key));

  logVerbose(
    `Copying ${key} (${Object.keys(sourceHead.metadata).length} metadata entries, ${tags.length} tags, ` +
      `storage class ${sourceHead.storageClass ?? 'STANDARD'})`
  );

  await step(key, 'copy', 'copy object', () =>
    destination.copyObject({
      sourceBucket: source.bucket,
      key,
      storageClass: sourceHead.storageClass,
    })
  );

  const copied = await step(key, 'verify', 'verify copied object', () => destination.headObject(key));

  if (copied.size !== object.size || copied.eTag !== object.eTag) {
    throw new VerificationError(
      { size: object.size, eTag: object.eTag },
      { size: copied.size, eTag: copied.eTag },
      key
    );
  }

  logVerbose(`Copied and verified object ${key} with metadata and tags`);
}
