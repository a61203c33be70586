/**
 * Reference Generator
 *
 * Lists the objects under a prefix and mints a presigned reference for each.
 * The sequence is lazy (one listing page in memory at a time) and can be
 * restarted from a key with `startAfter`. Listings come back in ascending
 * UTF-8 byte order, so a key not above the last one yielded is a repeat.
 */

import {
  type StoragePort,
  type ObjectReference,
  type PipelineError,
  AccessError,
  classifyError,
  normalizePrefix,
} from '@batchscribe/domain';

export type GeneratedReference =
  | { kind: 'minted'; reference: ObjectReference }
  | { kind: 'skipped'; key: string; error: PipelineError };

export interface ReferenceGeneratorOptions {
  bucket: string;

  /** User-facing prefix; "/" lists the whole bucket */
  prefix?: string;

  /** Lifetime of each minted reference */
  ttlSeconds: number;

  /** Resume after this key */
  startAfter?: string;

  now?: () => Date;
}

export class ReferenceGenerator {
  constructor(
    private readonly storage: StoragePort,
    private readonly options: ReferenceGeneratorOptions
  ) {}

  async *generate(): AsyncGenerator<GeneratedReference> {
    const { bucket, ttlSeconds } = this.options;
    const now = this.options.now ?? (() => new Date());
    const listing = normalizePrefix(this.options.prefix);
    const startAfter = laterKey(listing.startAfter, this.options.startAfter);
    let lastKey: string | undefined;

    for await (const object of this.storage.listObjects(bucket, { prefix: listing.prefix, startAfter })) {
      if (lastKey !== undefined && compareKeys(object.key, lastKey) <= 0) continue;
      lastKey = object.key;

      const mintedAt = now();
      let url: string;
      try {
        url = await this.storage.getPresignedUrl(bucket, object.key, ttlSeconds);
      } catch (error) {
        const classified = classifyError(error);
        // Bad credentials fail every object alike
        if (classified instanceof AccessError) throw classified;

        yield { kind: 'skipped', key: object.key, error: classified };
        continue;
      }

      yield {
        kind: 'minted',
        reference: { key: object.key, url, minted_at: mintedAt, ttl_seconds: ttlSeconds },
      };
    }
  }
}

/**
 * Order keys the way the object store lists them (by UTF-8 bytes, which
 * differs from UTF-16 string comparison above U+FFFF)
 */
export function compareKeys(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

function laterKey(a: string | undefined, b: string | undefined): string | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return compareKeys(a, b) > 0 ? a : b;
}
