import { ProcessingStatus } from '../enums/processing-status.enum';

export interface StoredBlob {
  blobName: string;
  blobUrl: string;
  containerName: string;
}

export interface OcrSummary {
  pageCount: number;
  processingTimeSeconds: number;
  textExtracted: boolean;
}

export class Document {
  id: string;
  processingId: string;

  // Batch grouping (absent for single uploads)
  batchId?: string;
  batchIndex?: number;

  // Source file
  fileName: string;
  contentType: string;
  fileSize: number; // Bytes
  ownerUserId?: string;
  description?: string;
  tags: string[];

  // Storage linkage: all three fields or none, set once after upload
  storage?: StoredBlob;

  // OCR results (PHI - never log)
  extractedText?: string;
  ocrSummary: OcrSummary;

  // Medical metadata parsed from the filename (PHI - never log)
  expediente?: string;
  nombrePaciente?: string;
  normalizedPatientName?: string;
  numeroEpisodio?: string;
  categoria?: string;
  medicalInfoValid: boolean;
  medicalInfoError?: string;

  status: ProcessingStatus;
  errorMessage?: string; // Sanitized error message

  createdAt: Date;
  updatedAt: Date;

  constructor(init: {
    id: string;
    processingId: string;
    fileName: string;
    contentType: string;
    fileSize: number;
    status: ProcessingStatus;
    createdAt: Date;
  }) {
    this.id = init.id;
    this.processingId = init.processingId;
    this.fileName = init.fileName;
    this.contentType = init.contentType;
    this.fileSize = init.fileSize;
    this.status = init.status;
    this.tags = [];
    this.ocrSummary = { pageCount: 0, processingTimeSeconds: 0, textExtracted: false };
    this.medicalInfoValid = false;
    this.createdAt = init.createdAt;
    this.updatedAt = init.createdAt;
  }
}
