import { describe, expect, it } from 'vitest';

import { copyAndVerifyObject } from './copy-verify';
import { VerificationError } from './errors';
import { createBucketPair } from './testing/memory-storage';

const KEY = 'media/clip.mp4';

function pairWithSourceObject() {
  const pair = createBucketPair();
  pair.source.putObject(KEY, {
    size: 2048,
    eTag: '"c0ffee"',
    storageClass: 'STANDARD_IA',
    metadata: { owner: 'video-team' },
    tags: [{ key: 'project', value: 'launch' }],
  });
  return pair;
}

describe('copyAndVerifyObject', () => {
  it('copies with metadata, tags and storage class, then verifies', async () => {
    const { source, destination } = pairWithSourceObject();

    await copyAndVerifyObject(source, destination, { key: KEY, size: 2048, eTag: '"c0ffee"' });

    expect(source.calls).toEqual([`headObject:${KEY}`, `getObjectTagging:${KEY}`]);
    expect(destination.calls).toEqual([`copyObject:${KEY}`, `headObject:${KEY}`]);
    expect(destination.objects.get(KEY)).toEqual({
      size: 2048,
      eTag: '"c0ffee"',
      storageClass: 'STANDARD_IA',
      metadata: { owner: 'video-team' },
      tags: [{ key: 'project', value: 'launch' }],
    });
  });

  it('fails verification when the copy lands with a different tag', async () => {
    const { source, destination } = pairWithSourceObject();
    destination.copyTransform = copy => ({ ...copy, eTag: '"rechunked"' });

    const copy = copyAndVerifyObject(source, destination, { key: KEY, size: 2048, eTag: '"c0ffee"' });

    await expect(copy).rejects.toBeInstanceOf(VerificationError);
    await expect(copy).rejects.toMatchObject({
      key: KEY,
      step: 'verify',
      expected: { size: 2048, eTag: '"c0ffee"' },
      actual: { size: 2048, eTag: '"rechunked"' },
      message: `Verification failed for object ${KEY}: size (source: 2048, dest: 2048), ` +
        'ETag (source: "c0ffee", dest: "rechunked")',
    });
  });

  it('compares against the listed values, not a fresh source head', async () => {
    const { source, destination } = pairWithSourceObject();

    // Listed before the source object was overwritten with new content
    const copy = copyAndVerifyObject(source, destination, { key: KEY, size: 1024, eTag: '"older"' });

    await expect(copy).rejects.toMatchObject({
      expected: { size: 1024, eTag: '"older"' },
      actual: { size: 2048, eTag: '"c0ffee"' },
    });
  });

  it('stops before copying when the source head fails', async () => {
    const { source, destination } = pairWithSourceObject();
    source.failOn('headObject', new Error('AccessDenied'), KEY);

    await expect(copyAndVerifyObject(source, destination, { key: KEY, size: 2048, eTag: '"c0ffee"' }))
      .rejects.toMatchObject({ step: 'head-source', message: `Failed to head source object ${KEY}: AccessDenied` });
    expect(destination.calls).toEqual([]);
  });

  it('stops before copying when tags cannot be read', async () => {
    const { source, destination } = pairWithSourceObject();
    source.failOn('getObjectTagging', new Error('AccessDenied'));

    await expect(copyAndVerifyObject(source, destination, { key: KEY, size: 2048, eTag: '"c0ffee"' }))
      .rejects.toMatchObject({ step: 'get-tags' });
    expect(destination.calls).toEqual([]);
  });

  it('reports a failed copy request', async () => {
    const { source, destination } = pairWithSourceObject();
    destination.failOn('copyObject', new Error('SlowDown'));

    await expect(copyAndVerifyObject(source, destination, { key: KEY, size: 2048, eTag: '"c0ffee"' }))
      .rejects.toMatchObject({ step: 'copy', message: `Failed to copy object ${KEY}: SlowDown` });
    expect(destination.callsOf('headObject')).toEqual([]);
  });

  it('reports a failed verification head', async () => {
    const { source, destination } = pairWithSourceObject();
    destination.failOn('headObject', new Error('InternalError'));

    await expect(copyAndVerifyObject(source, destination, { key: KEY, size: 2048, eTag: '"c0ffee"' }))
      .rejects.toMatchObject({ step: 'verify', message: `Failed to verify copied object ${KEY}: InternalError` });
  });
});
