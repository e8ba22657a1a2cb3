import type { OutputFormat } from '../../config';

export const CERTIFICATE_FIELDS = [
  'first_name',
  'middle_name',
  'last_name',
  'training_date',
  'issue_date',
  'certificate_number',
  'instructor_name',
] as const;

export type CertificateFieldName = (typeof CERTIFICATE_FIELDS)[number];

export type CertificateFields = Readonly<Record<CertificateFieldName, string>>;

export interface GenerationRequest {
  templateKey: string;
  signatureKey: string;
  outputKey?: string;
  outputFormat?: OutputFormat;
  data: Readonly<Record<string, unknown>>;
}

export interface GenerationOutcome {
  key: string;
  contentType: string;
  size: number;
}
