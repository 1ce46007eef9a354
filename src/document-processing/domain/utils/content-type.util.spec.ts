import { detectContentType } from './content-type.util';

describe('detectContentType', () => {
  it('should prefer the declared type', () => {
    expect(detectContentType('scan.pdf', 'image/png')).toBe('image/png');
  });

  it('should fall back to the extension for generic declared types', () => {
    expect(detectContentType('scan.PDF', 'application/octet-stream')).toBe(
      'application/pdf',
    );
    expect(detectContentType('scan.tif')).toBe('image/tiff');
  });

  it('should return octet-stream for unknown extensions', () => {
    expect(detectContentType('notes.xyz')).toBe('application/octet-stream');
    expect(detectContentType('noextension')).toBe('application/octet-stream');
  });
});
