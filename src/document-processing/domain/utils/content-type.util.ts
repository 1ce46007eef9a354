const CONTENT_TYPES_BY_EXTENSION: Record<string, string> = {
  pdf: 'application/pdf',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  tif: 'image/tiff',
  tiff: 'image/tiff',
  gif: 'image/gif',
  bmp: 'image/bmp',
  webp: 'image/webp',
};

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

/**
 * Resolve a document's content type. A specific client-declared type wins;
 * otherwise the file extension decides.
 */
export function detectContentType(
  fileName: string,
  declaredType?: string,
): string {
  if (declaredType && declaredType !== DEFAULT_CONTENT_TYPE) {
    return declaredType;
  }

  const dot = fileName.lastIndexOf('.');
  if (dot === -1) {
    return DEFAULT_CONTENT_TYPE;
  }

  const extension = fileName.slice(dot + 1).toLowerCase();
  return CONTENT_TYPES_BY_EXTENSION[extension] ?? DEFAULT_CONTENT_TYPE;
}
