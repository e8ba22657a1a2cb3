import type { Result } from '../../errors';

export const DOCX_CONTENT_TYPE =
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
export const PDF_CONTENT_TYPE = 'application/pdf';

export interface AssetBlob {
  key: string;
  data: Buffer;
  contentType: string;
}

export interface OutputArtifact {
  key: string;
  data: Buffer;
  contentType: string;
}

/**
 * Key-addressed byte storage shared by every request.
 * Implementations must tolerate concurrent calls on a single instance.
 */
export interface ObjectStore {
  get(key: string): Promise<Result<AssetBlob>>;
  put(key: string, data: Buffer, contentType: string): Promise<Result<void>>;
}
