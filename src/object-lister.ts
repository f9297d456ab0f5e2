// Local imports
import { errorMessage, ListingError } from './errors';
import { logVerbose } from './logger';

// Types
import type { ObjectDescriptor, StorageClient } from './types';

export interface ListOptions {
  prefix?: string;
  include?: string[];
  exclude?: string[];
}

/**
 * List all objects in a bucket, one page at a time, following the
 * continuation token until the service returns none
 */
export async function* listObjectPages(
  client: StorageClient,
  prefix?: string
): AsyncGenerator<ObjectDescriptor[]> {
  let continuationToken: string | undefined;
  let page = 0;

  do {
    const response = await client.listObjectsPage(continuationToken, prefix);
    page++;
    logVerbose(`Listed page ${page} of ${client.bucket} (${response.objects.length} objects)`);

    if (response.objects.length > 0) {
      yield response.objects;
    }

    continuationToken = response.nextContinuationToken;
  } while (continuationToken);
}

/**
 * Keep keys that match any include pattern (when given) and no exclude pattern
 */
export function filterObjects(
  objects: ObjectDescriptor[],
  include?: string[],
  exclude?: string[]
): ObjectDescriptor[] {
  let filtered = objects;

  if (include && include.length > 0) {
    const patterns = include.map(pattern => new RegExp(pattern));
    filtered = filtered.filter(object => patterns.some(pattern => pattern.test(object.key)));
  }

  if (exclude && exclude.length > 0) {
    const patterns = exclude.map(pattern => new RegExp(pattern));
    filtered = filtered.filter(object => !patterns.some(pattern => pattern.test(object.key)));
  }

  return filtered;
}

/**
 * Materialize the full object inventory of a bucket. A failure on any page
 * fails the whole listing, so a partial inventory is never returned.
 */
export async function listAllObjects(
  client: StorageClient,
  options: ListOptions = {}
): Promise<ObjectDescriptor[]> {
  const objects: ObjectDescriptor[] = [];

  try {
    for await (const page of listObjectPages(client, options.prefix)) {
      objects.push(...page);
    }
  } catch (error) {
    throw new ListingError(
      `Failed to list objects in ${client.bucket} after ${objects.length} objects: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  return filterObjects(objects, options.include, options.exclude);
}
