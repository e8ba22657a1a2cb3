import { fail, ok, type Result } from '../../errors';
import { CERTIFICATE_FIELDS, type CertificateFieldName, type CertificateFields } from './types';

const isScalar = (value: unknown) =>
  typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';

/** Picks the known certificate fields out of request data; absent ones become empty strings. */
export function normalizeFields(data: Readonly<Record<string, unknown>>): Result<CertificateFields> {
  for (const name of CERTIFICATE_FIELDS) {
    const value = data[name];
    if (value !== undefined && value !== null && !isScalar(value)) {
      return fail('ValidationError', `data.${name} must be a string`);
    }
  }

  const text = (name: CertificateFieldName) => {
    const value = data[name];
    return value === undefined || value === null ? '' : String(value);
  };

  return ok({
    first_name: text('first_name'),
    middle_name: text('middle_name'),
    last_name: text('last_name'),
    training_date: text('training_date'),
    issue_date: text('issue_date'),
    certificate_number: text('certificate_number'),
    instructor_name: text('instructor_name'),
  });
}
