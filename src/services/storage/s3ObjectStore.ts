import {
  GetObjectCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';

import { resolveStorageEndpoint, type Settings } from '../../config';
import { describeError, fail, ok, type Result } from '../../errors';
import { logger } from '../../logger';
import type { AssetBlob, ObjectStore } from './objectStore';

const MISSING_OBJECT_CODES = new Set(['NoSuchKey', 'NotFound']);

export function isMissingObjectError(error: unknown): boolean {
  if (!(error instanceof S3ServiceException)) return false;
  return MISSING_OBJECT_CODES.has(error.name) || error.$metadata.httpStatusCode === 404;
}

export function createS3Client(storage: Settings['storage']): S3Client {
  const { accessKeyId, secretAccessKey } = storage;
  if (!accessKeyId || !secretAccessKey) {
    throw new Error('S3 storage requires an access key id and secret');
  }
  return new S3Client({
    endpoint: resolveStorageEndpoint(storage),
    region: storage.region,
    credentials: { accessKeyId, secretAccessKey },
  });
}

export class S3ObjectStore implements ObjectStore {
  constructor(
    private readonly client: S3Client,
    private readonly bucket: string
  ) {}

  async get(key: string): Promise<Result<AssetBlob>> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      if (!response.Body) {
        return fail('AssetNotFound', `Object ${key} has no body`);
      }
      const bytes = await response.Body.transformToByteArray();
      return ok({
        key,
        data: Buffer.from(bytes),
        contentType: response.ContentType ?? 'application/octet-stream',
      });
    } catch (error) {
      if (isMissingObjectError(error)) {
        return fail('AssetNotFound', `Object ${key} not found in bucket ${this.bucket}`, error);
      }
      logger.error(`[Storage] Read of ${key} failed: ${describeError(error)}`);
      return fail('AssetStoreUnavailable', `Object store read failed for ${key}: ${describeError(error)}`, error);
    }
  }

  async put(key: string, data: Buffer, contentType: string): Promise<Result<void>> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: data,
          ContentType: contentType,
        })
      );
      return ok(undefined);
    } catch (error) {
      logger.error(`[Storage] Write of ${key} failed: ${describeError(error)}`);
      return fail('PublishError', `Object store write failed for ${key}: ${describeError(error)}`, error);
    }
  }
}
