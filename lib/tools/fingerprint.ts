import { Crypto } from '../utils';

export interface FingerprintFields {
  title: string;
  description: string;
  link: string;
}

function normalizeField(value: string): string {
  return value.toLowerCase().trim();
}

/**
 * Content-addressed identity: sha256 hex of "title description link",
 * each field lower-cased and trimmed.
 */
export function fingerprintItem(fields: FingerprintFields): string {
  const combined = [fields.title, fields.description, fields.link].map(normalizeField).join(' ');
  return Crypto.sha256(Buffer.from(combined, 'utf-8'));
}
