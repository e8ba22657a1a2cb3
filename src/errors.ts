export type PipelineErrorCode =
  | 'ValidationError'
  | 'AssetNotFound'
  | 'AssetStoreUnavailable'
  | 'EncodingError'
  | 'UnsupportedImageFormat'
  | 'TemplateRenderError'
  | 'InvalidIdentity'
  | 'ConversionProcessError'
  | 'ConversionOutputMissing'
  | 'PublishError';

export class PipelineError extends Error {
  constructor(
    readonly code: PipelineErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = code;
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: PipelineError };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });

export const fail = <T = never>(
  code: PipelineErrorCode,
  message: string,
  cause?: unknown
): Result<T> => ({ ok: false, error: new PipelineError(code, message, { cause }) });

export const describeError = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

const CLIENT_ERRORS: ReadonlySet<PipelineErrorCode> = new Set(['ValidationError', 'InvalidIdentity']);

export function httpStatusFor(code: PipelineErrorCode): number {
  return CLIENT_ERRORS.has(code) ? 400 : 500;
}
