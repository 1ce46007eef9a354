/**
 * Canonical form for patient names, applied identically at storage and
 * query time.
 *
 * trim → strip diacritics → uppercase → drop punctuation except commas →
 * collapse whitespace → `LAST, FIRST` with a single comma.
 *
 * Word order is preserved. The function is idempotent.
 */
export function normalizePatientName(raw: string): string {
  const folded = raw
    .trim()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toUpperCase()
    .replace(/[\s\-_./]/g, ' ')
    .replace(/[^A-Z0-9 ,]/g, '');

  const parts = folded
    .split(',')
    .map((part) => part.replace(/ +/g, ' ').trim())
    .filter((part) => part.length > 0);

  if (parts.length === 0) {
    return '';
  }
  if (parts.length === 1) {
    return parts[0];
  }

  return `${parts[0]}, ${parts.slice(1).join(' ')}`;
}

/**
 * Comma-free comparison form of an already normalized name
 */
export function toComparisonForm(normalized: string): string {
  return normalized.replace(/,/g, ' ').replace(/ +/g, ' ').trim();
}
