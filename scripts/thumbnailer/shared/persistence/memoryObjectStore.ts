import { RemoteError } from '../errors';
import type { ObjectStore } from './objectStore';

export interface StoredObject {
  body: Buffer;
  contentType: string;
}

export interface MemoryObjectStore extends ObjectStore {
  /** bucket → key → object */
  readonly buckets: Map<string, Map<string, StoredObject>>;
  /** Keys whose get/put should fail, for exercising per-key isolation. */
  readonly failing: { list: boolean; get: Set<string>; put: Set<string> };
  seed(bucket: string, key: string, body: Buffer, contentType?: string): void;
  keys(bucket: string): string[];
}

/** In-process ObjectStore for tests and dry local runs. */
export function createMemoryObjectStore(): MemoryObjectStore {
  const buckets = new Map<string, Map<string, StoredObject>>();
  const failing = { list: false, get: new Set<string>(), put: new Set<string>() };

  const bucketOf = (bucket: string) => {
    let b = buckets.get(bucket);
    if (!b) {
      b = new Map();
      buckets.set(bucket, b);
    }
    return b;
  };

  return {
    buckets,
    failing,

    seed(bucket, key, body, contentType = 'application/octet-stream') {
      bucketOf(bucket).set(key, { body, contentType });
    },

    keys(bucket) {
      return [...bucketOf(bucket).keys()].sort();
    },

    async list(bucket, prefix) {
      if (failing.list) throw new RemoteError('list failed: access denied', { bucket, prefix });
      return [...bucketOf(bucket).keys()].filter((k) => k.startsWith(prefix)).sort();
    },

    async get(bucket, key) {
      const obj = bucketOf(bucket).get(key);
      if (failing.get.has(key) || !obj) {
        throw new RemoteError('get failed: NoSuchKey', { bucket, key });
      }
      return Buffer.from(obj.body);
    },

    async put(bucket, key, body, contentType) {
      if (failing.put.has(key)) throw new RemoteError('put failed: access denied', { bucket, key });
      bucketOf(bucket).set(key, { body: Buffer.from(body), contentType });
    },
  };
}
