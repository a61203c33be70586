/**
 * Storage port interface for S3-compatible object storage
 *
 * Production: AWS S3 (or any S3-compatible endpoint)
 * Tests: in-memory storage from @batchscribe/domain/testing
 */
export interface StoragePort {
  /**
   * Verify credentials and connectivity
   */
  initialize(): Promise<void>;

  /**
   * Lazily list objects in a bucket, page by page
   */
  listObjects(bucket: string, options?: ListObjectsOptions): AsyncIterable<ObjectInfo>;

  /**
   * Generate presigned URL for object
   */
  getPresignedUrl(bucket: string, key: string, expiresInSeconds: number): Promise<string>;

  /**
   * Health check
   */
  healthCheck(): Promise<boolean>;

  /**
   * Close connection
   */
  close(): Promise<void>;
}

export interface ListObjectsOptions {
  /** Only keys starting with this prefix */
  prefix?: string;

  /** Only keys sorting after this one; lets a listing resume where it stopped */
  startAfter?: string;
}

export interface ObjectInfo {
  /** Object key */
  key: string;

  /** File size */
  size: number;

  /** Last modified */
  lastModified: Date;

  /** ETag */
  etag: string;
}

/**
 * Turn a user-facing prefix into listing options.
 *
 * A leading "/" is dropped ("/" alone means the whole bucket). A prefix naming
 * a "directory" (trailing "/") also becomes the start-after key so the
 * directory placeholder object itself is not listed.
 */
export function normalizePrefix(prefix: string = '/', delimiter: string = '/'): ListObjectsOptions {
  const trimmed = prefix.startsWith(delimiter) ? prefix.slice(delimiter.length) : prefix;

  return {
    prefix: trimmed || undefined,
    startAfter: trimmed.endsWith(delimiter) ? trimmed : undefined,
  };
}
