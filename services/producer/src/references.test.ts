import { describe, it, expect, vi } from 'vitest';
import {
  AccessError,
  NotFoundError,
  PermanentError,
  type ObjectInfo,
  type StoragePort,
} from '@batchscribe/domain';
import { MemoryStorage } from '@batchscribe/domain/testing';
import { ReferenceGenerator, compareKeys, type GeneratedReference } from './references.js';

const now = new Date('2026-03-01T12:00:00.000Z');

async function collect(generator: ReferenceGenerator): Promise<GeneratedReference[]> {
  const results: GeneratedReference[] = [];
  for await (const generated of generator.generate()) {
    results.push(generated);
  }
  return results;
}

function mintedKeys(results: GeneratedReference[]): string[] {
  return results.flatMap((result) => (result.kind === 'minted' ? [result.reference.key] : []));
}

/** Storage whose listing yields exactly the given keys, in order */
function listing(...keys: string[]): StoragePort {
  return {
    initialize: async () => undefined,
    async *listObjects() {
      for (const key of keys) {
        const object: ObjectInfo = { key, size: 1, lastModified: now, etag: key };
        yield object;
      }
    },
    getPresignedUrl: async (bucket, key) => `https://${bucket}.storage.test/${key}`,
    healthCheck: async () => true,
    close: async () => undefined,
  };
}

describe('compareKeys', () => {
  it('should order keys by their UTF-8 bytes', () => {
    expect(compareKeys('a.wav', 'b.wav')).toBeLessThan(0);
    expect(compareKeys('b.wav', 'b.wav')).toBe(0);
    expect(compareKeys('a\u{1F600}', 'a\uFFFD')).toBeGreaterThan(0);
  });
});

describe('ReferenceGenerator', () => {
  it('should mint a reference for every object in the bucket', async () => {
    const storage = new MemoryStorage().addObjects('media', ['b.wav', 'a.wav']);
    const generator = new ReferenceGenerator(storage, { bucket: 'media', ttlSeconds: 3600, now: () => now });

    const results = await collect(generator);

    expect(results).toEqual([
      {
        kind: 'minted',
        reference: {
          key: 'a.wav',
          url: MemoryStorage.urlFor('media', 'a.wav', 3600),
          minted_at: now,
          ttl_seconds: 3600,
        },
      },
      {
        kind: 'minted',
        reference: {
          key: 'b.wav',
          url: MemoryStorage.urlFor('media', 'b.wav', 3600),
          minted_at: now,
          ttl_seconds: 3600,
        },
      },
    ]);
  });

  it('should only list keys under a directory prefix, without the directory itself', async () => {
    const storage = new MemoryStorage().addObjects('media', ['a.wav', 'calls/', 'calls/c.wav', 'callsign.wav']);
    const generator = new ReferenceGenerator(storage, { bucket: 'media', prefix: '/calls/', ttlSeconds: 60 });

    const results = await collect(generator);

    expect(mintedKeys(results)).toEqual(['calls/c.wav']);
    expect(storage.listCalls[0].options).toEqual({ prefix: 'calls/', startAfter: 'calls/' });
  });

  it('should resume after a given key', async () => {
    const storage = new MemoryStorage().addObjects('media', ['a.wav', 'b.wav', 'c.wav']);
    const generator = new ReferenceGenerator(storage, { bucket: 'media', ttlSeconds: 60, startAfter: 'a.wav' });

    expect(mintedKeys(await collect(generator))).toEqual(['b.wav', 'c.wav']);
  });

  it('should never yield the same key twice in one run', async () => {
    const results = await collect(
      new ReferenceGenerator(listing('a.wav', 'a.wav', 'b.wav', 'b.wav', 'c.wav'), { bucket: 'media', ttlSeconds: 60 })
    );

    expect(mintedKeys(results)).toEqual(['a.wav', 'b.wav', 'c.wav']);
  });

  it('should drop a key replayed from an earlier listing page', async () => {
    const results = await collect(
      new ReferenceGenerator(listing('a.wav', 'b.wav', 'a.wav', 'c.wav'), { bucket: 'media', ttlSeconds: 60 })
    );

    expect(mintedKeys(results)).toEqual(['a.wav', 'b.wav', 'c.wav']);
  });

  it('should follow the byte order of the listing for keys beyond the basic plane', async () => {
    const keys = ['a\uFFFD.wav', 'a\u{1F600}.wav'];

    const results = await collect(new ReferenceGenerator(listing(...keys), { bucket: 'media', ttlSeconds: 60 }));

    expect(mintedKeys(results)).toEqual(keys);
  });

  it('should not sign a repeat of a key that could not be signed', async () => {
    const storage = listing('a.wav', 'a.wav', 'b.wav');
    const presign = vi
      .spyOn(storage, 'getPresignedUrl')
      .mockRejectedValueOnce(new PermanentError('Cannot sign media/a.wav'));

    const results = await collect(new ReferenceGenerator(storage, { bucket: 'media', ttlSeconds: 60 }));

    expect(results.map((result) => result.kind)).toEqual(['skipped', 'minted']);
    expect(presign).toHaveBeenCalledTimes(2);
  });

  it('should skip an object that cannot be signed', async () => {
    const storage = new MemoryStorage().addObjects('media', ['a.wav', 'b.wav']).failPresign('a.wav');

    const results = await collect(new ReferenceGenerator(storage, { bucket: 'media', ttlSeconds: 60 }));

    expect(results[0]).toEqual({
      kind: 'skipped',
      key: 'a.wav',
      error: new PermanentError('Cannot sign media/a.wav'),
    });
    expect(mintedKeys(results)).toEqual(['b.wav']);
  });

  it('should stop when signing is denied', async () => {
    const storage = new MemoryStorage().addObjects('media', ['a.wav', 'b.wav']);
    vi.spyOn(storage, 'getPresignedUrl').mockRejectedValueOnce(new AccessError('Credentials rejected'));

    await expect(collect(new ReferenceGenerator(storage, { bucket: 'media', ttlSeconds: 60 }))).rejects.toThrow(
      AccessError
    );
  });

  it('should fail with AccessError for a denied bucket', async () => {
    const storage = new MemoryStorage().addObjects('media', ['a.wav']).denyAccess('media');

    await expect(collect(new ReferenceGenerator(storage, { bucket: 'media', ttlSeconds: 60 }))).rejects.toThrow(
      AccessError
    );
  });

  it('should fail with NotFoundError for a missing bucket', async () => {
    const storage = new MemoryStorage();

    await expect(collect(new ReferenceGenerator(storage, { bucket: 'nope', ttlSeconds: 60 }))).rejects.toThrow(
      NotFoundError
    );
  });
});
