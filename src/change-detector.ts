// Local imports
import { errorMessage, ObjectNotFoundError, ObjectSyncError } from './errors';
import { SyncDecision } from './types';

// Types
import type { ObjectDescriptor, ObjectHead, StorageClient } from './types';

export type ChangeDetection =
  | { decision: SyncDecision.ABSENT }
  | { decision: SyncDecision.STALE | SyncDecision.CURRENT; destination: { size: number; eTag: string } };

/**
 * Compare a source object with what the destination currently holds at the
 * same key. Size and entity tag must both match for the copy to be current;
 * objects copied with different multipart chunking can share a size but not
 * an entity tag.
 */
export async function detectChange(
  destination: StorageClient,
  object: ObjectDescriptor
): Promise<ChangeDetection> {
  let head: ObjectHead;

  try {
    head = await destination.headObject(object.key);
  } catch (error) {
    if (error instanceof ObjectNotFoundError) {
      return { decision: SyncDecision.ABSENT };
    }
    throw new ObjectSyncError(
      `Failed to head destination object ${object.key}: ${errorMessage(error)}`,
      object.key,
      'head-destination',
      { cause: error }
    );
  }

  const observed = { size: head.size, eTag: head.eTag };

  if (head.size !== object.size || head.eTag !== object.eTag) {
    return { decision: SyncDecision.STALE, destination: observed };
  }

  return { decision: SyncDecision.CURRENT, destination: observed };
}
