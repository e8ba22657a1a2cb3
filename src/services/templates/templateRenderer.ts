import { randomUUID } from 'crypto';
import Docxtemplater from 'docxtemplater';
import ImageModule from 'docxtemplater-image-module-free';
import PizZip from 'pizzip';

import { describeError, fail, ok, type Result } from '../../errors';
import { logger } from '../../logger';
import type { CertificateFields } from '../certificates/types';
import type { EncodedImage } from '../images/imageNormalizer';
import { formatDate } from './dateFormat';

const PIXELS_PER_INCH = 96;
const MM_PER_INCH = 25.4;

export interface EmbeddedImage {
  data: Buffer;
  displayWidth: number;
  displayHeight: number;
}

export type TemplateValue = string | EmbeddedImage;

export type RenderContext = Readonly<Record<string, TemplateValue>>;

export const mmToPixels = (mm: number) => Math.round((mm / MM_PER_INCH) * PIXELS_PER_INCH);

/** Sizes an image to a fixed display width, keeping its aspect ratio. */
export function embedImage(image: EncodedImage, widthMm: number): EmbeddedImage {
  const displayWidth = mmToPixels(widthMm);
  return {
    data: image.data,
    displayWidth,
    displayHeight: Math.max(1, Math.round((displayWidth * image.height) / image.width)),
  };
}

export function buildRenderContext(
  fields: CertificateFields,
  images: { qrCode: EncodedImage; signature: EncodedImage },
  embedWidthMm: number
): RenderContext {
  return {
    first_name: fields.first_name,
    middle_name: fields.middle_name,
    last_name: fields.last_name,
    training_date: formatDate(fields.training_date),
    issue_date: formatDate(fields.issue_date),
    certificate_number: fields.certificate_number,
    instructor_name: fields.instructor_name,
    qr_code: embedImage(images.qrCode, embedWidthMm),
    instructor_signature: embedImage(images.signature, embedWidthMm),
  };
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

function explainTemplateError(error: unknown): string {
  if (error instanceof Error && 'properties' in error && isRecord(error.properties)) {
    const nested = error.properties.errors;
    if (Array.isArray(nested) && nested.length > 0) {
      return nested
        .map((entry: unknown) => {
          if (entry instanceof Error && 'properties' in entry && isRecord(entry.properties)) {
            const { explanation } = entry.properties;
            if (typeof explanation === 'string') return explanation;
          }
          return describeError(entry);
        })
        .join('; ');
    }
    if (typeof error.properties.explanation === 'string') {
      return error.properties.explanation;
    }
  }
  return describeError(error);
}

/** Names the image placeholder whose token was written out by a text tag, if any. */
function findImageInText(zip: PizZip, nonce: string): string | undefined {
  const token = new RegExp(`${nonce}:([\\w.-]+)`);
  for (const part of zip.file(/^word\/.+\.xml$/)) {
    const match = token.exec(part.asText());
    if (match) return match[1];
  }
  return undefined;
}

/**
 * Fills `{{name}}` text tags and `{{%name}}` image tags in a .docx template.
 * Tags without a value render empty; context entries the template never mentions are ignored.
 */
export class TemplateRenderer {
  render(template: Buffer, context: RenderContext): Result<Buffer> {
    let zip: PizZip;
    try {
      zip = new PizZip(template);
    } catch (error) {
      return fail('TemplateRenderError', `Template is not a valid docx archive: ${describeError(error)}`, error);
    }

    // The image module treats object values as pre-resolved images, so images enter the scope as tokens.
    const images = new Map<string, EmbeddedImage>();
    const nonce = randomUUID();
    const scope: Record<string, string> = {};
    for (const [name, value] of Object.entries(context)) {
      if (typeof value === 'string') {
        scope[name] = value;
      } else {
        const token = `${nonce}:${name}`;
        images.set(token, value);
        scope[name] = token;
      }
    }
    const lookupImage = (tagValue: unknown, tagName: string) => {
      const image = typeof tagValue === 'string' ? images.get(tagValue) : undefined;
      if (!image) {
        throw new Error(`Placeholder ${tagName} expects an image`);
      }
      return image;
    };

    const imageModule = new ImageModule({
      centered: false,
      fileType: 'docx',
      getImage: (tagValue, tagName) => lookupImage(tagValue, tagName).data,
      getSize: (_image, tagValue, tagName) => {
        const image = lookupImage(tagValue, tagName);
        return [image.displayWidth, image.displayHeight];
      },
    });

    let output: unknown;
    try {
      // The image module only supports the attach/load/setOptions sequence.
      const doc = new Docxtemplater();
      Object.assign(doc, { hideDeprecations: true });
      doc.attachModule(imageModule);
      doc.loadZip(zip);
      doc.setOptions({
        delimiters: { start: '{{', end: '}}' },
        paragraphLoop: true,
        linebreaks: true,
        parser: (tag: string) => {
          const name = tag.trim();
          return {
            get: (current: unknown) => (isRecord(current) ? current[name] : undefined),
          };
        },
        nullGetter() {
          return '';
        },
      });
      doc.render(scope);
      const misplaced = findImageInText(doc.getZip(), nonce);
      if (misplaced) {
        logger.error(`[Template] Placeholder ${misplaced} expects text but was given an image`);
        return fail('TemplateRenderError', `Placeholder ${misplaced} expects text but was given an image`);
      }
      output = doc.getZip().generate({ type: 'nodebuffer', compression: 'DEFLATE' });
    } catch (error) {
      const details = explainTemplateError(error);
      logger.error(`[Template] Render failed: ${details}`);
      return fail('TemplateRenderError', `Template render failed: ${details}`, error);
    }

    if (!Buffer.isBuffer(output)) {
      return fail('TemplateRenderError', 'Rendered template could not be serialized');
    }
    logger.info(`[Template] Rendered document (${output.length} bytes)`);
    return ok(output);
  }
}
