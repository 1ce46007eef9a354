import { StoredBlob } from '../entities/document.entity';

export interface OcrResult {
  text: string; // Extracted plain text
  pageCount: number;
  processingTimeSeconds: number;
}

export interface OcrServicePort {
  /**
   * Extract text from a stored document.
   * @param blob - Location returned by the storage port
   * @param contentType - Document MIME type
   */
  extractText(blob: StoredBlob, contentType: string): Promise<OcrResult>;
}
