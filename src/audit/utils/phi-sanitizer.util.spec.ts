import {
  sanitizeErrorMessage,
  sanitizeMetadata,
} from './phi-sanitizer.util';

describe('PHI sanitizer', () => {
  describe('sanitizeErrorMessage', () => {
    it('should redact patient names in filename form', () => {
      expect(
        sanitizeErrorMessage('Upload failed for PEREZ GOMEZ, JUAN CARLOS'),
      ).toBe('Upload failed for [NAME_REDACTED]');
    });

    it('should redact record numbers before phone patterns', () => {
      expect(sanitizeErrorMessage('expediente 3000128494 rejected')).toBe(
        'expediente [NUMBER_REDACTED] rejected',
      );
    });

    it('should redact emails and bearer tokens', () => {
      expect(
        sanitizeErrorMessage('user a.b@example.com sent Bearer abc.def'),
      ).toBe('user [EMAIL_REDACTED] sent Bearer [TOKEN_REDACTED]');
    });

    it('should truncate to 500 characters', () => {
      expect(sanitizeErrorMessage('x'.repeat(600))).toHaveLength(500);
    });

    it('should return empty string for empty input', () => {
      expect(sanitizeErrorMessage('')).toBe('');
    });
  });

  describe('sanitizeMetadata', () => {
    it('should drop PHI keys and keep operational fields', () => {
      expect(
        sanitizeMetadata({
          documentId: 'doc-1',
          fileSize: 1024,
          fileName: '1_PEREZ, JUAN_2_LAB.pdf',
          nombrePaciente: 'PEREZ, JUAN',
          nested: { extractedText: 'secret', categoria: 'LAB' },
          contact: 'someone@example.com',
        }),
      ).toEqual({
        documentId: 'doc-1',
        fileSize: 1024,
        nested: { categoria: 'LAB' },
      });
    });

    it('should return an empty object for undefined', () => {
      expect(sanitizeMetadata(undefined)).toEqual({});
    });
  });
});
