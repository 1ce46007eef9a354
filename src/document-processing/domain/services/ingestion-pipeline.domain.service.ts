import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import {
  DocumentRepositoryPort,
  InsertOutcome,
} from '../ports/document.repository.port';
import { StorageServicePort } from '../ports/storage.service.port';
import { OcrServicePort } from '../ports/ocr.service.port';
import { Document } from '../entities/document.entity';
import {
  BatchFailure,
  BatchResult,
  BatchSuccess,
} from '../entities/batch-result.entity';
import { ProcessingStatus } from '../enums/processing-status.enum';
import { BatchStatus } from '../enums/batch-status.enum';
import { DocumentStateMachine } from '../utils/document-state-machine.util';
import { extractFilenameMetadata } from '../utils/filename-metadata.extractor';
import { detectContentType } from '../utils/content-type.util';
import { runWithConcurrency } from '../utils/run-with-concurrency.util';
import { normalizePatientName } from '../../../patient-search/domain/utils/name-normalizer';
import { AuditService, DocumentEventType } from '../../../audit/audit.service';
import { sanitizeErrorMessage } from '../../../audit/utils/phi-sanitizer.util';
import { AllConfigType } from '../../../config/config.type';
import {
  DomainError,
  DomainErrorKind,
  IngestionError,
  ValidationError,
  errorMessageOf,
} from '../../../utils/errors/domain.error';

export interface IncomingFile {
  buffer: Buffer;
  originalName: string;
  contentType?: string; // Client-declared MIME type
}

export interface IngestionOptions {
  ownerUserId?: string;
  description?: string;
  tags?: string[];
  signal?: AbortSignal;
}

// Width of the file_name column
export const MAX_FILE_NAME_LENGTH = 255;

interface BatchSlot {
  batchId: string;
  index: number;
}

/**
 * IngestionPipelineDomainService
 *
 * Turns uploaded files into persisted Document records:
 * filename metadata → blob upload → OCR → persistence.
 *
 * Failure policy:
 * - Filename metadata failure: recorded on the document, not fatal
 * - Storage failure: fatal for the file, nothing persisted
 * - OCR failure: document persisted with status FAILED
 * - Persistence failure or cancellation: uploaded blob is deleted
 *
 * PHI: patient names, record numbers and OCR text never reach the logs.
 */
@Injectable()
export class IngestionPipelineDomainService {
  private readonly logger = new Logger(IngestionPipelineDomainService.name);

  constructor(
    @Inject('DocumentRepositoryPort')
    private readonly documentRepository: DocumentRepositoryPort,
    @Inject('StorageServicePort')
    private readonly storageService: StorageServicePort,
    @Inject('OcrServicePort')
    private readonly ocrService: OcrServicePort,
    private readonly auditService: AuditService,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  /**
   * Ingest a single document and persist it.
   *
   * @throws ValidationError for an empty or oversized file
   * @throws IngestionError (storage, persistence, cancelled)
   */
  async ingestDocument(
    file: IncomingFile,
    options: IngestionOptions = {},
  ): Promise<Document> {
    this.validateFile(file);

    const document = await this.prepareDocument(file, options);

    try {
      this.throwIfAborted(options.signal, file.originalName);
      const saved = await this.documentRepository.insertOne(document);

      this.logger.log(
        `[INGESTION] Document ${saved.id} persisted with status ${saved.status}`,
      );
      this.auditService.logDocumentEvent({
        event:
          saved.status === ProcessingStatus.FAILED
            ? DocumentEventType.DOCUMENT_PROCESSING_FAILED
            : DocumentEventType.DOCUMENT_PROCESSING_COMPLETED,
        documentId: saved.id,
        userId: saved.ownerUserId,
        success: saved.status !== ProcessingStatus.FAILED,
        errorMessage: saved.errorMessage,
        metadata: {
          fileSize: saved.fileSize,
          contentType: saved.contentType,
          medicalInfoValid: saved.medicalInfoValid,
        },
      });

      return saved;
    } catch (error) {
      await this.compensate(document);

      if (DomainError.isDomainError(error)) {
        throw error;
      }

      this.logger.error(
        `[INGESTION] Persistence failed for document ${document.id}: ${sanitizeErrorMessage(errorMessageOf(error))}`,
      );
      throw new IngestionError({
        kind: DomainErrorKind.PERSISTENCE,
        message: 'Failed to persist document',
        fileName: file.originalName,
        suggestion: 'Retry the upload later',
        cause: error,
      });
    }
  }

  /**
   * Ingest a batch of files on a bounded worker pool, then persist every
   * processed document with one bulk insert.
   *
   * Per-file failures are reported in the result. Only batch validation,
   * bulk persistence failures and cancellation reject.
   */
  async ingestBatch(
    files: IncomingFile[],
    options: IngestionOptions = {},
  ): Promise<BatchResult> {
    const maxFiles = this.configService.getOrThrow(
      'documentProcessing.maxFilesPerBatch',
      { infer: true },
    );
    if (files.length === 0) {
      throw new ValidationError('No files provided');
    }
    if (files.length > maxFiles) {
      throw new ValidationError(
        `Maximum ${maxFiles} files per batch`,
        'Split the upload into smaller batches',
      );
    }

    const startedAt = Date.now();
    const batchId = randomUUID();
    const batchTimestamp = new Date();
    const workers = this.configService.getOrThrow(
      'documentProcessing.batchMaxWorkers',
      { infer: true },
    );

    this.logger.log(
      `[INGESTION] Batch ${batchId} started: ${files.length} files, ${workers} workers`,
    );

    const settled = await runWithConcurrency(
      files,
      workers,
      async (file, index) => {
        this.validateFile(file);
        return this.prepareDocument(file, options, { batchId, index });
      },
    );

    const failed: BatchFailure[] = [];
    const prepared: BatchSuccess[] = [];
    settled.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        prepared.push({ index, document: outcome.value });
      } else {
        failed.push(this.toBatchFailure(index, files[index], outcome.reason));
      }
    });

    if (options.signal?.aborted) {
      await Promise.all(
        prepared.map(({ document }) => this.compensate(document)),
      );
      throw new DomainError({
        kind: DomainErrorKind.CANCELLED,
        message: `Batch ${batchId} was cancelled`,
      });
    }

    const successful: BatchSuccess[] = [];
    if (prepared.length > 0) {
      let outcomes: InsertOutcome[];
      try {
        outcomes = await this.documentRepository.insertMany(
          prepared.map(({ document }) => document),
        );
      } catch (error) {
        await Promise.all(
          prepared.map(({ document }) => this.compensate(document)),
        );
        this.logger.error(
          `[INGESTION] Bulk insert failed for batch ${batchId}: ${sanitizeErrorMessage(errorMessageOf(error))}`,
        );
        throw new DomainError({
          kind: DomainErrorKind.PERSISTENCE,
          message: 'Failed to persist batch',
          suggestion: 'Retry the upload later',
          cause: error,
        });
      }

      for (let i = 0; i < prepared.length; i++) {
        const { index, document } = prepared[i];
        const outcome = outcomes[i];
        if (outcome && outcome.ok) {
          successful.push({ index, document });
        } else {
          await this.compensate(document);
          failed.push({
            index,
            fileName: document.fileName,
            errorKind: DomainErrorKind.PERSISTENCE,
            error: sanitizeErrorMessage(
              outcome ? outcome.error : 'Missing insert outcome',
            ),
          });
        }
      }
    }

    failed.sort((a, b) => a.index - b.index);
    const result = this.buildBatchResult({
      batchId,
      batchTimestamp,
      files,
      options,
      successful,
      failed,
      durationMs: Date.now() - startedAt,
    });

    this.logger.log(
      `[INGESTION] Batch ${batchId} finished: ${result.processedCount}/${result.totalFiles} processed (${result.status})`,
    );
    this.auditService.logDocumentEvent({
      event: DocumentEventType.BATCH_PROCESSED,
      batchId,
      userId: options.ownerUserId,
      success: result.status !== BatchStatus.FAILED,
      metadata: {
        totalFiles: result.totalFiles,
        processedCount: result.processedCount,
        failedCount: result.failedCount,
      },
    });

    return result;
  }

  /**
   * Run the per-file steps up to (not including) persistence.
   * Resolves with a COMPLETED or FAILED (OCR) document holding a stored blob.
   */
  private async prepareDocument(
    file: IncomingFile,
    options: IngestionOptions,
    batch?: BatchSlot,
  ): Promise<Document> {
    const fileName = file.originalName;
    this.throwIfAborted(options.signal, fileName);

    const document = new Document({
      id: randomUUID(),
      processingId: randomUUID(),
      fileName,
      contentType: detectContentType(fileName, file.contentType),
      fileSize: file.buffer.length,
      status: ProcessingStatus.PENDING,
      createdAt: new Date(),
    });
    document.batchId = batch?.batchId;
    document.batchIndex = batch?.index;
    document.ownerUserId = options.ownerUserId;
    document.description = options.description;
    document.tags = options.tags ? [...options.tags] : [];

    // 1. Filename metadata (non-fatal)
    const metadata = extractFilenameMetadata(fileName);
    if (metadata.valid) {
      const normalized = normalizePatientName(metadata.nombrePaciente);
      document.expediente = metadata.expediente;
      document.nombrePaciente = metadata.nombrePaciente;
      document.numeroEpisodio = metadata.numeroEpisodio;
      document.categoria = metadata.categoria;
      document.normalizedPatientName = normalized || undefined;
      document.medicalInfoValid = normalized.length > 0;
      document.medicalInfoError = normalized
        ? undefined
        : 'Patient name is empty after normalization';
    } else {
      document.medicalInfoValid = false;
      document.medicalInfoError = metadata.error;
      this.logger.debug(
        `[INGESTION] Document ${document.id} has no medical metadata`,
      );
    }

    // 2. Blob upload (fatal)
    try {
      document.storage = await this.storageService.put(
        file.buffer,
        fileName,
        document.contentType,
      );
    } catch (error) {
      this.logger.error(
        `[INGESTION] Storage upload failed for document ${document.id}: ${sanitizeErrorMessage(errorMessageOf(error))}`,
      );
      throw new IngestionError({
        kind: DomainErrorKind.STORAGE,
        message: 'Failed to upload document to storage',
        fileName,
        cause: error,
      });
    }
    this.transition(document, ProcessingStatus.UPLOADED);
    this.auditService.logDocumentEvent({
      event: DocumentEventType.DOCUMENT_UPLOADED,
      documentId: document.id,
      batchId: document.batchId,
      userId: document.ownerUserId,
      success: true,
      metadata: {
        fileSize: document.fileSize,
        contentType: document.contentType,
      },
    });

    if (options.signal?.aborted) {
      await this.compensate(document);
      this.throwIfAborted(options.signal, fileName);
    }

    // 3. OCR (recoverable)
    try {
      const ocr = await this.ocrService.extractText(
        document.storage,
        document.contentType,
      );
      document.extractedText = ocr.text;
      document.ocrSummary = {
        pageCount: ocr.pageCount,
        processingTimeSeconds: ocr.processingTimeSeconds,
        textExtracted: ocr.text.trim().length > 0,
      };
      this.transition(document, ProcessingStatus.OCR_COMPLETED);
      this.transition(document, ProcessingStatus.COMPLETED);
    } catch (error) {
      const message = sanitizeErrorMessage(errorMessageOf(error));
      this.logger.warn(
        `[INGESTION] OCR failed for document ${document.id}: ${message}`,
      );
      document.errorMessage = `OCR failed: ${message}`;
      document.ocrSummary = {
        pageCount: 0,
        processingTimeSeconds: 0,
        textExtracted: false,
      };
      this.transition(document, ProcessingStatus.FAILED);
    }

    if (options.signal?.aborted) {
      await this.compensate(document);
      this.throwIfAborted(options.signal, fileName);
    }

    return document;
  }

  private validateFile(file: IncomingFile): void {
    if (!file.originalName || file.originalName.trim().length === 0) {
      throw new ValidationError('File name is required');
    }
    if ([...file.originalName].length > MAX_FILE_NAME_LENGTH) {
      throw new ValidationError(
        `File name exceeds ${MAX_FILE_NAME_LENGTH} characters`,
        'Shorten the file name before uploading',
      );
    }
    if (file.buffer.length === 0) {
      throw new ValidationError(`File ${file.originalName} is empty`);
    }

    const maxFileSizeMb = this.configService.getOrThrow(
      'documentProcessing.maxFileSizeMb',
      { infer: true },
    );
    if (file.buffer.length > maxFileSizeMb * 1024 * 1024) {
      throw new ValidationError(
        `File ${file.originalName} exceeds the ${maxFileSizeMb} MB limit`,
      );
    }
  }

  private transition(document: Document, to: ProcessingStatus): void {
    DocumentStateMachine.validateTransition(document.status, to);
    document.status = to;
    document.updatedAt = new Date();
  }

  private throwIfAborted(signal: AbortSignal | undefined, fileName: string) {
    if (signal?.aborted) {
      throw new IngestionError({
        kind: DomainErrorKind.CANCELLED,
        message: 'Ingestion was cancelled',
        fileName,
      });
    }
  }

  /**
   * Delete the uploaded blob of a document that will not be persisted.
   * A failed delete is logged; the original error still wins.
   */
  private async compensate(document: Document): Promise<void> {
    if (!document.storage) {
      return;
    }

    try {
      await this.storageService.delete(document.storage.blobName);
      this.logger.log(
        `[INGESTION] Removed blob for unpersisted document ${document.id}`,
      );
    } catch (error) {
      this.logger.error(
        `[INGESTION] Failed to remove blob for document ${document.id}: ${sanitizeErrorMessage(errorMessageOf(error))}`,
      );
    }
  }

  private toBatchFailure(
    index: number,
    file: IncomingFile,
    reason: unknown,
  ): BatchFailure {
    const errorKind = DomainError.isDomainError(reason)
      ? reason.kind
      : DomainErrorKind.STORAGE;

    return {
      index,
      fileName: file.originalName,
      errorKind,
      error: sanitizeErrorMessage(errorMessageOf(reason)),
    };
  }

  private buildBatchResult(params: {
    batchId: string;
    batchTimestamp: Date;
    files: IncomingFile[];
    options: IngestionOptions;
    successful: BatchSuccess[];
    failed: BatchFailure[];
    durationMs: number;
  }): BatchResult {
    const totalFiles = params.files.length;
    const processedCount = params.successful.length;
    const failedCount = params.failed.length;

    let status = BatchStatus.PARTIAL_SUCCESS;
    if (failedCount === 0) {
      status = BatchStatus.COMPLETED;
    } else if (processedCount === 0) {
      status = BatchStatus.FAILED;
    }

    const result: BatchResult = {
      batchId: params.batchId,
      batchTimestamp: params.batchTimestamp,
      description: params.options.description,
      ownerUserId: params.options.ownerUserId,
      totalFiles,
      processedCount,
      failedCount,
      successRate: Math.round((processedCount / totalFiles) * 10000) / 100,
      status,
      successful: Object.freeze(params.successful),
      failed: Object.freeze(params.failed),
      summary: {
        totalSizeBytes: params.files.reduce(
          (sum, file) => sum + file.buffer.length,
          0,
        ),
        successfulSizeBytes: params.successful.reduce(
          (sum, { document }) => sum + document.fileSize,
          0,
        ),
        processingDurationSeconds:
          Math.round((params.durationMs / 1000) * 100) / 100,
      },
    };

    return Object.freeze(result);
  }
}
