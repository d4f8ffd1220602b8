import { InvalidDocumentKeyError } from './errors';
import type { DocumentKeyParts } from './types';

// {company}/{year}_{type}.pdf, e.g. RELIANCE/2024_BRSR.pdf
const FLAT_KEY = /^([^/]+)\/(\d{4})_[^/]+\.pdf$/i;
// {company}/{year}_{year}/{file}.pdf, e.g. TCS/2023_2024/brsr.pdf
const FISCAL_KEY = /^([^/]+)\/(\d{4})_\d{4}\/[^/]+\.pdf$/i;

export function parseDocumentKey(documentKey: string): DocumentKeyParts {
  const match = FLAT_KEY.exec(documentKey) ?? FISCAL_KEY.exec(documentKey);
  if (!match) {
    throw new InvalidDocumentKeyError(documentKey);
  }
  const [, companyName, year] = match;
  return { companyName, reportYear: Number.parseInt(year, 10) };
}
