import type { OutputFormat, Settings } from '../../config';
import { fail, ok, type Result } from '../../errors';
import { logger } from '../../logger';
import { FormatConverter, type DocumentConverter } from '../conversion/formatConverter';
import { ImageNormalizer } from '../images/imageNormalizer';
import { deriveOutputKey, replaceExtension } from '../naming/filenameDeriver';
import { buildVerificationPayload, QrEncoder } from '../qr/qrEncoder';
import { ArtifactPublisher } from '../storage/artifactPublisher';
import { AssetFetcher } from '../storage/assetFetcher';
import { DOCX_CONTENT_TYPE, type ObjectStore, type OutputArtifact } from '../storage/objectStore';
import { buildRenderContext, TemplateRenderer } from '../templates/templateRenderer';
import { normalizeFields } from './fields';
import type { GenerationOutcome, GenerationRequest } from './types';

export interface CertificatePipelineOptions {
  fetcher: AssetFetcher;
  publisher: ArtifactPublisher;
  qr: QrEncoder;
  images: ImageNormalizer;
  renderer: TemplateRenderer;
  converter: DocumentConverter;
  verifyBaseUrl?: string;
  embedWidthMm: number;
  defaultFormat: OutputFormat;
}

/**
 * One request in, one stored artifact out. Stages run strictly in sequence and the first
 * failing stage ends the request before anything is published.
 */
export class CertificatePipeline {
  constructor(private readonly options: CertificatePipelineOptions) {}

  async generate(request: GenerationRequest): Promise<Result<GenerationOutcome>> {
    const { fetcher, publisher, qr, images, renderer, converter } = this.options;

    const fields = normalizeFields(request.data);
    if (!fields.ok) return fields;
    if (!fields.value.certificate_number) {
      return fail('ValidationError', 'certificate_number missing');
    }

    const docxKey = deriveOutputKey({
      certificateNumber: fields.value.certificate_number,
      firstName: fields.value.first_name,
      middleName: fields.value.middle_name,
      lastName: fields.value.last_name,
    });
    if (!docxKey.ok) return docxKey;
    if (request.outputKey && request.outputKey !== docxKey.value) {
      logger.info(`[Pipeline] Ignoring requested key ${request.outputKey} in favour of ${docxKey.value}`);
    }

    const template = await fetcher.fetch(request.templateKey);
    if (!template.ok) return template;

    const payload = buildVerificationPayload(this.options.verifyBaseUrl, fields.value.certificate_number);
    const qrCode = await qr.encode(payload);
    if (!qrCode.ok) return qrCode;

    const signatureBlob = await fetcher.fetch(request.signatureKey);
    if (!signatureBlob.ok) return signatureBlob;
    const signature = await images.normalize(signatureBlob.value.data);
    if (!signature.ok) return signature;

    const context = buildRenderContext(
      fields.value,
      { qrCode: qrCode.value, signature: signature.value },
      this.options.embedWidthMm
    );
    const rendered = renderer.render(template.value.data, context);
    if (!rendered.ok) return rendered;

    let artifact: OutputArtifact = {
      key: docxKey.value,
      data: rendered.value,
      contentType: DOCX_CONTENT_TYPE,
    };

    const format = request.outputFormat ?? this.options.defaultFormat;
    if (format === 'pdf') {
      const converted = await converter.convert(rendered.value);
      if (!converted.ok) return converted;
      artifact = {
        key: replaceExtension(docxKey.value, converter.extension),
        data: converted.value,
        contentType: converter.contentType,
      };
    }

    const published = await publisher.publish(artifact);
    if (!published.ok) return published;

    logger.info(`[Pipeline] Certificate stored at ${artifact.key}`);
    return ok({ key: artifact.key, contentType: artifact.contentType, size: artifact.data.length });
  }
}

export function createCertificatePipeline(
  settings: Settings,
  store: ObjectStore,
  converter: DocumentConverter = new FormatConverter({
    executable: settings.conversion.executable,
    timeoutMs: settings.conversion.timeoutMs,
  })
): CertificatePipeline {
  return new CertificatePipeline({
    fetcher: new AssetFetcher(store),
    publisher: new ArtifactPublisher(store),
    qr: new QrEncoder(),
    images: new ImageNormalizer({
      maxWidth: settings.images.signatureMaxWidth,
      maxHeight: settings.images.signatureMaxHeight,
    }),
    renderer: new TemplateRenderer(),
    converter,
    verifyBaseUrl: settings.verification.baseUrl,
    embedWidthMm: settings.images.embedWidthMm,
    defaultFormat: settings.conversion.defaultFormat,
  });
}
