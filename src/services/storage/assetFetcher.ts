import { fail, type Result } from '../../errors';
import { logger } from '../../logger';
import type { AssetBlob, ObjectStore } from './objectStore';

export class AssetFetcher {
  constructor(private readonly store: ObjectStore) {}

  async fetch(key: string): Promise<Result<AssetBlob>> {
    if (!key.trim()) {
      return fail('ValidationError', 'Asset key must not be empty');
    }
    const result = await this.store.get(key);
    if (result.ok) {
      logger.info(`[Storage] Fetched ${key} (${result.value.data.length} bytes)`);
    } else {
      logger.error(`[Storage] Fetch of ${key} failed: ${result.error.message}`);
    }
    return result;
  }
}
