/**
 * S3 Storage Adapter
 *
 * Implements the StoragePort interface against AWS S3 or any S3-compatible
 * endpoint (MinIO for local development).
 *
 * Listing is lazy and paginated; presigned GET URLs are the time-bounded
 * references handed to the ASR engine.
 */

import {
  S3Client,
  GetObjectCommand,
  HeadBucketCommand,
  ListObjectsV2Command,
  S3ServiceException,
  type ListObjectsV2CommandOutput,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import {
  type StoragePort,
  type StorageConfig,
  type ListObjectsOptions,
  type ObjectInfo,
  AccessError,
  NotFoundError,
  PipelineError,
  classifyError,
} from '@batchscribe/domain';

const ACCESS_ERROR_NAMES = new Set([
  'AccessDenied',
  'Forbidden',
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'CredentialsProviderError',
]);

const NOT_FOUND_ERROR_NAMES = new Set(['NoSuchBucket', 'NotFound', 'NoSuchKey']);

export interface S3StorageConfig {
  /** AWS region */
  region: string;

  /** Custom endpoint URL (e.g., http://localhost:9000 for MinIO) */
  endpoint?: string;

  /** Access key ID; the default credential chain is used when unset */
  accessKeyId?: string;

  /** Secret access key */
  secretAccessKey?: string;

  /** Use path-style URLs (required for MinIO) */
  forcePathStyle?: boolean;

  /** Bucket checked by initialize() and healthCheck() */
  bucket?: string;
}

/**
 * Storage adapter for S3-compatible object stores
 */
export class S3StorageAdapter implements StoragePort {
  private config: S3StorageConfig;
  private client: S3Client;

  constructor(config: S3StorageConfig) {
    this.config = {
      forcePathStyle: Boolean(config.endpoint),
      ...config,
    };

    this.client = new S3Client({
      region: this.config.region,
      endpoint: this.config.endpoint,
      credentials:
        this.config.accessKeyId && this.config.secretAccessKey
          ? {
              accessKeyId: this.config.accessKeyId,
              secretAccessKey: this.config.secretAccessKey,
            }
          : undefined,
      forcePathStyle: this.config.forcePathStyle,
    });
  }

  /**
   * Probe the configured bucket so bad credentials fail before any listing
   */
  async initialize(): Promise<void> {
    if (!this.config.bucket) return;

    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.config.bucket }));
    } catch (error) {
      throw toStorageError(error, `Cannot access bucket ${this.config.bucket}`);
    }

    console.log(`[S3] Connected to bucket ${this.config.bucket} (${this.config.endpoint ?? this.config.region})`);
  }

  // ==================== Listing ====================

  async *listObjects(bucket: string, options: ListObjectsOptions = {}): AsyncIterable<ObjectInfo> {
    let continuationToken: string | undefined;
    let page = 0;

    do {
      let response: ListObjectsV2CommandOutput;
      try {
        response = await this.client.send(
          new ListObjectsV2Command({
            Bucket: bucket,
            Prefix: options.prefix,
            // S3 ignores StartAfter once a continuation token is present
            StartAfter: continuationToken ? undefined : options.startAfter,
            ContinuationToken: continuationToken,
          })
        );
      } catch (error) {
        throw toStorageError(error, `Cannot list bucket ${bucket}`);
      }

      page++;
      for (const obj of response.Contents ?? []) {
        // Skip directory placeholders
        if (!obj.Key || obj.Key.endsWith('/')) continue;

        yield {
          key: obj.Key,
          size: obj.Size ?? 0,
          lastModified: obj.LastModified ?? new Date(),
          etag: obj.ETag?.replace(/"/g, '') ?? '',
        };
      }

      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
      if (continuationToken) {
        console.log(`[S3] Fetching page ${page + 1} of ${bucket}`);
      }
    } while (continuationToken);
  }

  // ==================== References ====================

  async getPresignedUrl(bucket: string, key: string, expiresInSeconds: number): Promise<string> {
    const command = new GetObjectCommand({ Bucket: bucket, Key: key });

    try {
      return await getSignedUrl(this.client, command, { expiresIn: expiresInSeconds });
    } catch (error) {
      throw toStorageError(error, `Cannot sign ${bucket}/${key}`);
    }
  }

  // ==================== Health & Cleanup ====================

  async healthCheck(): Promise<boolean> {
    if (!this.config.bucket) return true;

    try {
      await this.client.send(new ListObjectsV2Command({ Bucket: this.config.bucket, MaxKeys: 1 }));
      return true;
    } catch (error) {
      console.error('[S3] Health check failed:', error);
      return false;
    }
  }

  async close(): Promise<void> {
    // S3Client doesn't have explicit close - it uses connection pooling
    this.client.destroy();
    console.log('[S3] Closed S3 client');
  }
}

/**
 * Map an SDK failure into the pipeline error taxonomy
 */
export function toStorageError(error: unknown, context: string): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  const name = error instanceof Error ? error.name : '';
  const message = error instanceof Error ? error.message : String(error);
  const status = error instanceof S3ServiceException ? error.$metadata.httpStatusCode : undefined;

  if (ACCESS_ERROR_NAMES.has(name) || status === 401 || status === 403) {
    return new AccessError(`${context}: ${message}`, { cause: error });
  }

  if (NOT_FOUND_ERROR_NAMES.has(name) || status === 404) {
    return new NotFoundError(`${context}: ${message}`, { cause: error });
  }

  return classifyError(error);
}

/**
 * Create storage adapter from loaded configuration
 */
export function createS3StorageAdapter(config: StorageConfig): S3StorageAdapter {
  return new S3StorageAdapter({
    region: config.region,
    endpoint: config.endpoint,
    accessKeyId: config.accessKeyId,
    secretAccessKey: config.secretAccessKey,
    bucket: config.bucket,
  });
}
