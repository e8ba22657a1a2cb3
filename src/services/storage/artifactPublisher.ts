import { fail, type Result } from '../../errors';
import { logger } from '../../logger';
import type { ObjectStore, OutputArtifact } from './objectStore';

/** Writes the final artifact. Existing keys are overwritten without a version check. */
export class ArtifactPublisher {
  constructor(private readonly store: ObjectStore) {}

  async publish(artifact: OutputArtifact): Promise<Result<void>> {
    if (!artifact.key.trim()) {
      return fail('PublishError', 'Artifact key must not be empty');
    }
    const result = await this.store.put(artifact.key, artifact.data, artifact.contentType);
    if (result.ok) {
      logger.info(`[Storage] Published ${artifact.key} (${artifact.contentType})`);
    }
    return result;
  }
}
