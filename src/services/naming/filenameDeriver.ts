import path from 'path';

import { fail, ok, type Result } from '../../errors';

export const OUTPUT_FOLDER = 'certificates';

export function sanitize(value: string): string {
  return value
    .trim()
    .replace(/\s+/g, '_')
    .replace(/[^A-Za-z0-9_]/g, '');
}

export interface CertificateIdentity {
  certificateNumber: string;
  firstName: string;
  middleName: string;
  lastName: string;
}

/**
 * `certificates/{certNo}_{first}[_{middle}]_{last}.docx`. This key always replaces any
 * output key the caller suggested.
 */
export function deriveOutputKey(identity: CertificateIdentity): Result<string> {
  const certificateNumber = sanitize(identity.certificateNumber);
  const first = sanitize(identity.firstName);
  const middle = sanitize(identity.middleName);
  const last = sanitize(identity.lastName);

  if (!certificateNumber || !first || !last) {
    return fail('InvalidIdentity', 'certificate_number, first_name and last_name are required');
  }

  const parts = [certificateNumber, first];
  if (middle) {
    parts.push(middle);
  }
  parts.push(last);

  return ok(`${OUTPUT_FOLDER}/${parts.join('_')}.docx`);
}

export function replaceExtension(key: string, extension: string): string {
  const normalized = extension.startsWith('.') ? extension : `.${extension}`;
  const current = path.posix.extname(key);
  return `${current ? key.slice(0, -current.length) : key}${normalized}`;
}
