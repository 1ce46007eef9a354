export enum ProcessingStatus {
  PENDING = 'pending', // Record initialized, nothing stored yet
  UPLOADED = 'uploaded', // Bytes stored in blob storage
  OCR_COMPLETED = 'ocr_completed', // Text extracted
  COMPLETED = 'completed', // Fully processed
  FAILED = 'failed', // OCR failed, record kept for retrieval
}
