/**
 * PHI Sanitizer Utility
 *
 * PHI Exclusion Rules:
 * - Never log: document contents, OCR text, patient names, record numbers, emails
 * - Always log: documentId, batchId, userId, eventType, timestamp, success
 * - Optional metadata: fileSize, contentType, categoria (non-PHI metadata only)
 */

const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;
const PHONE_PATTERN = /(\+?1[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}/g;

// "LAST NAME, FIRST NAME" as found in medical filenames
const COMMA_NAME_PATTERN =
  /\b[A-ZÀ-Ý]{2,}(?:\s+[A-ZÀ-Ý]{2,})*,\s*[A-ZÀ-Ý]{2,}(?:\s+[A-ZÀ-Ý]{2,})*/g;

/**
 * Sanitize error messages to remove PHI and sensitive data
 *
 * @returns Sanitized error message (max 500 chars)
 */
export function sanitizeErrorMessage(error: string): string {
  if (!error) {
    return '';
  }

  let sanitized = error;

  sanitized = sanitized.replace(EMAIL_PATTERN, '[EMAIL_REDACTED]');

  // Remove tokens
  sanitized = sanitized.replace(/Bearer\s+[^\s]+/gi, 'Bearer [TOKEN_REDACTED]');
  sanitized = sanitized.replace(/token[:\s]+[^\s]+/gi, 'token: [REDACTED]');
  sanitized = sanitized.replace(
    /api[_-]?key[:\s]+[^\s]+/gi,
    'api_key: [REDACTED]',
  );

  // Long numbers first: record and episode numbers look like phone numbers
  sanitized = sanitized.replace(/\d{10,}/g, '[NUMBER_REDACTED]');
  sanitized = sanitized.replace(PHONE_PATTERN, '[PHONE_REDACTED]');

  sanitized = sanitized.replace(COMMA_NAME_PATTERN, '[NAME_REDACTED]');
  sanitized = sanitized.replace(
    /\b[A-Z][a-z]+\s+[A-Z][a-z]+\b/g,
    '[NAME_REDACTED]',
  );

  return sanitized.substring(0, 500);
}

const PHI_KEYS = new Set([
  'extractedText',
  'ocrText',
  'text',
  'content',
  'fileName',
  'nombrePaciente',
  'normalizedPatientName',
  'patientName',
  'searchTerm',
  'expediente',
  'numeroEpisodio',
  'name',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Remove PHI-bearing keys and email/phone-like string values, recursively.
 *
 * Keeps ids, counts, sizes, statuses and categories.
 */
export function sanitizeMetadata(
  metadata: Record<string, unknown> | undefined,
): Record<string, unknown> {
  if (!metadata) {
    return {};
  }

  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(metadata)) {
    if (PHI_KEYS.has(key)) {
      continue;
    }

    if (typeof value === 'string') {
      if (new RegExp(EMAIL_PATTERN.source).test(value)) {
        continue;
      }
      if (new RegExp(PHONE_PATTERN.source).test(value)) {
        continue;
      }
      sanitized[key] = value;
    } else if (isRecord(value)) {
      sanitized[key] = sanitizeMetadata(value);
    } else if (Array.isArray(value)) {
      sanitized[key] = value.map((item: unknown) =>
        isRecord(item) ? sanitizeMetadata(item) : item,
      );
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}
