import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';
import {
  sanitizeErrorMessage,
  sanitizeMetadata,
} from './utils/phi-sanitizer.util';

export enum DocumentEventType {
  DOCUMENT_UPLOADED = 'DOCUMENT_UPLOADED',
  DOCUMENT_PROCESSING_COMPLETED = 'DOCUMENT_PROCESSING_COMPLETED',
  DOCUMENT_PROCESSING_FAILED = 'DOCUMENT_PROCESSING_FAILED',
  DOCUMENT_ACCESSED = 'DOCUMENT_ACCESSED',
  DOCUMENT_DELETED = 'DOCUMENT_DELETED',
  BATCH_PROCESSED = 'BATCH_PROCESSED',
  PATIENT_SEARCH = 'PATIENT_SEARCH',
}

export interface DocumentEventData {
  event: DocumentEventType;
  documentId?: string;
  batchId?: string;
  userId?: string;
  success: boolean;
  errorMessage?: string;
  metadata?: Record<string, unknown>; // Non-PHI event-specific data
}

/**
 * Audit Service for logging of document events
 *
 * Requirements:
 * - Logs contain ids, timestamp, event type, and outcome
 * - NO PHI: no patient names, record numbers, OCR text or filenames
 * - Error text and metadata pass through the PHI sanitizer
 */
@Injectable()
export class AuditService {
  constructor(private configService: ConfigService<AllConfigType>) {}

  logDocumentEvent(data: DocumentEventData): void {
    const logEntry = {
      timestamp: new Date().toISOString(),
      service: this.configService.get('app.name', { infer: true }),
      component: 'documents',
      event: data.event,
      documentId: data.documentId,
      batchId: data.batchId,
      userId: data.userId,
      success: data.success,
      errorType: data.errorMessage
        ? sanitizeErrorMessage(data.errorMessage)
        : undefined,
      environment: this.configService.get('app.nodeEnv', { infer: true }),
      ...(data.metadata ? { metadata: sanitizeMetadata(data.metadata) } : {}),
    };

    // Structured JSON logging for Cloud Logging compatibility
    console.info(JSON.stringify(logEntry));
  }
}
