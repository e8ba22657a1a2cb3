import QRCode, { type QRCodeToBufferOptions } from 'qrcode';

import { describeError, fail, ok, type Result } from '../../errors';
import { logger } from '../../logger';
import { readImageSize, type EncodedImage } from '../images/imageNormalizer';

const QR_OPTIONS: QRCodeToBufferOptions = {
  type: 'png',
  errorCorrectionLevel: 'M',
  margin: 4,
  scale: 10,
  color: { dark: '#000000', light: '#ffffff' },
};

/**
 * Joins the verification base URL and certificate number with exactly one slash.
 * Without a base URL the certificate number itself is encoded.
 */
export function buildVerificationPayload(baseUrl: string | undefined, certificateNumber: string): string {
  if (!baseUrl) return certificateNumber;
  return `${baseUrl.replace(/\/+$/, '')}/${certificateNumber.replace(/^\/+/, '')}`;
}

export class QrEncoder {
  async encode(payload: string): Promise<Result<EncodedImage>> {
    if (!payload) {
      return fail('EncodingError', 'QR payload must not be empty');
    }
    try {
      const data = await QRCode.toBuffer(payload, QR_OPTIONS);
      const size = await readImageSize(data);
      if (!size) {
        return fail('EncodingError', 'QR image has no readable dimensions');
      }
      logger.info(`[QR] Encoded ${payload.length} chars into ${size.width}x${size.height} PNG`);
      return ok({ data, ...size });
    } catch (error) {
      return fail('EncodingError', `QR encoding failed: ${describeError(error)}`, error);
    }
  }
}
