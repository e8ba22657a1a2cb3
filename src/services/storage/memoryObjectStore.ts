import { fail, ok, type Result } from '../../errors';
import type { AssetBlob, ObjectStore } from './objectStore';

interface StoredObject {
  data: Buffer;
  contentType: string;
}

/** In-process store for local runs without a bucket. */
export class MemoryObjectStore implements ObjectStore {
  private readonly objects = new Map<string, StoredObject>();

  seed(key: string, data: Buffer, contentType = 'application/octet-stream') {
    this.objects.set(key, { data: Buffer.from(data), contentType });
    return this;
  }

  has(key: string) {
    return this.objects.has(key);
  }

  peek(key: string): StoredObject | undefined {
    return this.objects.get(key);
  }

  async get(key: string): Promise<Result<AssetBlob>> {
    const stored = this.objects.get(key);
    if (!stored) {
      return fail('AssetNotFound', `Object ${key} not found`);
    }
    return ok({ key, data: Buffer.from(stored.data), contentType: stored.contentType });
  }

  async put(key: string, data: Buffer, contentType: string): Promise<Result<void>> {
    this.objects.set(key, { data: Buffer.from(data), contentType });
    return ok(undefined);
  }
}
