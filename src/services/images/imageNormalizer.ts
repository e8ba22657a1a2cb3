import sharp from 'sharp';

import { describeError, fail, ok, type Result } from '../../errors';
import { logger } from '../../logger';

export interface EncodedImage {
  data: Buffer;
  width: number;
  height: number;
}

export interface ImageBounds {
  maxWidth: number;
  maxHeight: number;
}

export const SIGNATURE_BOUNDS: ImageBounds = { maxWidth: 800, maxHeight: 300 };

/**
 * Decodes any raster format sharp understands and re-encodes it as RGBA PNG.
 * Images larger than the bounds are shrunk to fit with their aspect ratio kept; smaller ones
 * keep their size.
 */
export class ImageNormalizer {
  constructor(private readonly bounds: ImageBounds = SIGNATURE_BOUNDS) {}

  async normalize(
    raw: Buffer,
    maxWidth = this.bounds.maxWidth,
    maxHeight = this.bounds.maxHeight
  ): Promise<Result<EncodedImage>> {
    try {
      const metadata = await sharp(raw).metadata();
      if (!metadata.width || !metadata.height) {
        return fail('UnsupportedImageFormat', 'Image has no readable dimensions');
      }
    } catch (error) {
      return fail('UnsupportedImageFormat', `Unsupported image format: ${describeError(error)}`, error);
    }

    try {
      const { data, info } = await sharp(raw)
        .ensureAlpha()
        .resize(maxWidth, maxHeight, { fit: 'inside', withoutEnlargement: true })
        .png()
        .toBuffer({ resolveWithObject: true });
      logger.info(`[Images] Normalized image to ${info.width}x${info.height}`);
      return ok({ data, width: info.width, height: info.height });
    } catch (error) {
      return fail('UnsupportedImageFormat', `Image could not be decoded: ${describeError(error)}`, error);
    }
  }
}

export async function readImageSize(data: Buffer): Promise<{ width: number; height: number } | undefined> {
  const { width, height } = await sharp(data).metadata();
  return width && height ? { width, height } : undefined;
}
