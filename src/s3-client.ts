// Third-party dependencies
import {
  BucketLocationConstraint,
  CopyObjectCommand,
  CreateBucketCommand,
  GetBucketLifecycleConfigurationCommand,
  GetBucketPolicyCommand,
  GetBucketVersioningCommand,
  GetObjectTaggingCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  MetadataDirective,
  PutBucketLifecycleConfigurationCommand,
  PutBucketPolicyCommand,
  PutBucketVersioningCommand,
  S3Client,
  S3ServiceException,
  TaggingDirective,
} from '@aws-sdk/client-s3';

// Local imports
import { ObjectNotFoundError } from './errors';
import { logVerbose } from './logger';

// Types
import type {
  CreateBucketConfiguration,
  LifecycleRule,
  ListObjectsV2CommandOutput,
  S3ClientConfig,
} from '@aws-sdk/client-s3';
import type {
  AccountConfig,
  BucketCreateResult,
  CopyObjectRequest,
  ObjectHead,
  ObjectListPage,
  ObjectTag,
  StorageClient,
  VersioningState,
} from './types';

// Error codes the service uses for conditions the engine tolerates
const NOT_FOUND_CODES = ['NotFound', 'NoSuchKey'];
const BUCKET_OWNED_CODES = ['BucketAlreadyOwnedByYou'];
const BUCKET_EXISTS_CODES = ['BucketAlreadyExists'];
const NO_POLICY_CODES = ['NoSuchBucketPolicy'];
const NO_LIFECYCLE_CODES = ['NoSuchLifecycleConfiguration'];

/**
 * Create an S3 client from account credentials. Transient failures are
 * retried by the SDK's standard retry strategy, up to `maxAttempts`.
 */
export function createS3Client(account: AccountConfig, maxAttempts: number): S3Client {
  const clientConfig: S3ClientConfig = {
    region: account.region,
    credentials: {
      accessKeyId: account.accessKey,
      secretAccessKey: account.secretKey,
    },
    forcePathStyle: account.forcePathStyle ?? false,
    maxAttempts,
    retryMode: 'standard',
  };

  if (account.endpoint) {
    clientConfig.endpoint = account.endpoint;
  }

  return new S3Client(clientConfig);
}

/**
 * Check whether an error carries one of the given service error codes.
 *
 * Structured SDK exceptions are matched on their code. Anything else falls
 * back to matching the error name or message text, which is the only signal
 * some S3 compatible services give.
 */
export function hasErrorCode(error: unknown, codes: readonly string[]): boolean {
  if (error instanceof S3ServiceException) {
    return codes.includes(error.name);
  }

  if (error instanceof Error) {
    return codes.some(code => error.name === code || error.message.includes(code));
  }

  return false;
}

/**
 * Whether a head request failed because the object does not exist
 */
export function isNotFoundError(error: unknown): boolean {
  if (error instanceof S3ServiceException && error.$metadata.httpStatusCode === 404) {
    return true;
  }

  // HEAD responses carry no body, so some services only surface the status
  return hasErrorCode(error, [...NOT_FOUND_CODES, '404']);
}

export function isBucketOwnedError(error: unknown): boolean {
  return hasErrorCode(error, BUCKET_OWNED_CODES);
}

export function isBucketExistsError(error: unknown): boolean {
  return hasErrorCode(error, BUCKET_EXISTS_CODES);
}

export function isNoPolicyError(error: unknown): boolean {
  return hasErrorCode(error, NO_POLICY_CODES);
}

export function isNoLifecycleError(error: unknown): boolean {
  return hasErrorCode(error, NO_LIFECYCLE_CODES);
}

function isLocationConstraint(region: string): region is BucketLocationConstraint {
  return Object.values<string>(BucketLocationConstraint).includes(region);
}

/**
 * Bucket configuration for a create request. us-east-1 is the default
 * location and must not be sent as a constraint.
 */
export function createBucketConfiguration(region: string): CreateBucketConfiguration | undefined {
  if (region === 'us-east-1' || !isLocationConstraint(region)) {
    return undefined;
  }

  return { LocationConstraint: region };
}

/**
 * Build the CopySource header value. Keys are URL-encoded per path segment.
 */
export function formatCopySource(bucket: string, key: string): string {
  const encodedKey = key.split('/').map(segment => encodeURIComponent(segment)).join('/');
  return `${bucket}/${encodedKey}`;
}

/**
 * Storage client bound to one bucket of one account
 */
export class S3StorageClient implements StorageClient {
  constructor(
    private readonly client: S3Client,
    readonly bucket: string,
    private readonly region: string
  ) {}

  static fromAccount(account: AccountConfig, maxAttempts: number): S3StorageClient {
    return new S3StorageClient(createS3Client(account, maxAttempts), account.bucket, account.region);
  }

  async listObjectsPage(continuationToken?: string, prefix?: string): Promise<ObjectListPage> {
    const command = new ListObjectsV2Command({
      Bucket: this.bucket,
      Prefix: prefix || undefined,
      ContinuationToken: continuationToken,
      MaxKeys: 1000,
    });

    const response: ListObjectsV2CommandOutput = await this.client.send(command);
    const objects: ObjectListPage['objects'] = [];

    for (const item of response.Contents ?? []) {
      if (!item.Key) {
        continue;
      }

      objects.push({
        key: item.Key,
        size: item.Size ?? 0,
        eTag: item.ETag ?? '',
      });
    }

    return {
      objects,
      nextContinuationToken: response.NextContinuationToken || undefined,
    };
  }

  async headObject(key: string): Promise<ObjectHead> {
    const command = new HeadObjectCommand({
      Bucket: this.bucket,
      Key: key,
    });

    try {
      const response = await this.client.send(command);
      return {
        size: response.ContentLength ?? 0,
        eTag: response.ETag ?? '',
        storageClass: response.StorageClass,
        metadata: response.Metadata ?? {},
      };
    } catch (error) {
      if (isNotFoundError(error)) {
        throw new ObjectNotFoundError(this.bucket, key, { cause: error });
      }
      throw error;
    }
  }

  async getObjectTagging(key: string): Promise<ObjectTag[]> {
    const response = await this.client.send(new GetObjectTaggingCommand({
      Bucket: this.bucket,
      Key: key,
    }));

    return (response.TagSet ?? []).map(tag => ({
      key: tag.Key ?? '',
      value: tag.Value ?? '',
    }));
  }

  async copyObject(request: CopyObjectRequest): Promise<void> {
    await this.client.send(new CopyObjectCommand({
      Bucket: this.bucket,
      Key: request.key,
      CopySource: formatCopySource(request.sourceBucket, request.key),
      MetadataDirective: MetadataDirective.COPY,
      TaggingDirective: TaggingDirective.COPY,
      StorageClass: request.storageClass,
    }));
  }

  async createBucket(): Promise<BucketCreateResult> {
    try {
      await this.client.send(new CreateBucketCommand({
        Bucket: this.bucket,
        CreateBucketConfiguration: createBucketConfiguration(this.region),
      }));
      return 'created';
    } catch (error) {
      if (isBucketOwnedError(error)) {
        return 'already-owned';
      }
      if (isBucketExistsError(error)) {
        return 'already-exists';
      }
      throw error;
    }
  }

  async getBucketPolicy(): Promise<string | null> {
    try {
      const response = await this.client.send(new GetBucketPolicyCommand({ Bucket: this.bucket }));
      return response.Policy ?? null;
    } catch (error) {
      if (isNoPolicyError(error)) {
        return null;
      }
      throw error;
    }
  }

  async putBucketPolicy(policy: string): Promise<void> {
    await this.client.send(new PutBucketPolicyCommand({
      Bucket: this.bucket,
      Policy: policy,
    }));
  }

  async getBucketVersioning(): Promise<VersioningState> {
    const response = await this.client.send(new GetBucketVersioningCommand({ Bucket: this.bucket }));
    return response.Status ?? 'Disabled';
  }

  async putBucketVersioning(state: VersioningState): Promise<void> {
    // A bucket that never had versioning cannot be set back to that state
    if (state === 'Disabled') {
      logVerbose(`Versioning is not enabled, leaving ${this.bucket} unchanged`);
      return;
    }

    await this.client.send(new PutBucketVersioningCommand({
      Bucket: this.bucket,
      VersioningConfiguration: {
        Status: state,
      },
    }));
  }

  async getBucketLifecycle(): Promise<LifecycleRule[] | null> {
    try {
      const response = await this.client.send(new GetBucketLifecycleConfigurationCommand({
        Bucket: this.bucket,
      }));
      return response.Rules ?? null;
    } catch (error) {
      if (isNoLifecycleError(error)) {
        return null;
      }
      throw error;
    }
  }

  async putBucketLifecycle(rules: LifecycleRule[]): Promise<void> {
    await this.client.send(new PutBucketLifecycleConfigurationCommand({
      Bucket: this.bucket,
      LifecycleConfiguration: {
        Rules: rules,
      },
    }));
  }
}
