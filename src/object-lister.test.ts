import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ListingError, SyncPhase } from './errors';
import { filterObjects, listAllObjects, listObjectPages } from './object-lister';
import { MemoryStorageClient } from './testing/memory-storage';

function bucketWith(keys: string[]): MemoryStorageClient {
  const client = new MemoryStorageClient('source-bucket');
  keys.forEach((key, index) => client.putObject(key, { size: index + 1, eTag: `"etag-${key}"` }));
  return client;
}

describe('listObjectPages', () => {
  it('follows continuation tokens until the last page', async () => {
    const client = bucketWith(['a', 'b', 'c', 'd', 'e']);
    client.pageSize = 2;

    const pages: string[][] = [];
    for await (const page of listObjectPages(client)) {
      pages.push(page.map(object => object.key));
    }

    expect(pages).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
    expect(client.calls).toEqual(['listObjectsPage', 'listObjectsPage:2', 'listObjectsPage:4']);
  });

  it('yields nothing for an empty bucket', async () => {
    const client = bucketWith([]);

    const pages = [];
    for await (const page of listObjectPages(client)) {
      pages.push(page);
    }

    expect(pages).toEqual([]);
    expect(client.calls).toEqual(['listObjectsPage']);
  });
});

describe('listAllObjects', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('materializes every page in listing order', async () => {
    const client = bucketWith(['a', 'b', 'c']);
    client.pageSize = 1;

    const objects = await listAllObjects(client);

    expect(objects).toEqual([
      { key: 'a', size: 1, eTag: '"etag-a"' },
      { key: 'b', size: 2, eTag: '"etag-b"' },
      { key: 'c', size: 3, eTag: '"etag-c"' },
    ]);
  });

  it('passes the prefix to every page request', async () => {
    const client = bucketWith(['logs/1', 'images/1', 'logs/2', 'images/2']);
    client.pageSize = 1;

    const objects = await listAllObjects(client, { prefix: 'images/' });

    expect(objects.map(object => object.key)).toEqual(['images/1', 'images/2']);
  });

  it('applies include and exclude patterns', async () => {
    const client = bucketWith(['a.jpg', 'b.png', 'tmp/c.jpg', 'd.txt']);

    const objects = await listAllObjects(client, { include: ['\\.jpg$', '\\.png$'], exclude: ['^tmp/'] });

    expect(objects.map(object => object.key)).toEqual(['a.jpg', 'b.png']);
  });

  it('fails the whole listing when a later page fails', async () => {
    const client = bucketWith(['a', 'b', 'c']);
    client.pageSize = 1;
    client.failOn('listObjectsPage', new Error('SlowDown'), '2');

    const listing = listAllObjects(client);

    await expect(listing).rejects.toBeInstanceOf(ListingError);
    await expect(listing).rejects.toMatchObject({
      phase: SyncPhase.LISTING,
      message: 'Failed to list objects in source-bucket after 2 objects: SlowDown',
    });
  });
});

describe('filterObjects', () => {
  const objects = [
    { key: 'a.jpg', size: 1, eTag: 'x' },
    { key: 'b.txt', size: 1, eTag: 'y' },
  ];

  it('returns everything without patterns', () => {
    expect(filterObjects(objects)).toEqual(objects);
    expect(filterObjects(objects, [], [])).toEqual(objects);
  });

  it('keeps only included keys', () => {
    expect(filterObjects(objects, ['\\.txt$'])).toEqual([objects[1]]);
  });

  it('drops excluded keys', () => {
    expect(filterObjects(objects, undefined, ['^a'])).toEqual([objects[1]]);
  });
});
