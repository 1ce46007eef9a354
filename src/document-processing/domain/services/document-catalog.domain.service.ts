import { Inject, Injectable, Logger } from '@nestjs/common';
import { DocumentRepositoryPort } from '../ports/document.repository.port';
import { StorageServicePort } from '../ports/storage.service.port';
import { Document } from '../entities/document.entity';
import { AuditService, DocumentEventType } from '../../../audit/audit.service';
import { sanitizeErrorMessage } from '../../../audit/utils/phi-sanitizer.util';
import {
  DeniedError,
  NotFoundError,
  ValidationError,
  errorMessageOf,
} from '../../../utils/errors/domain.error';

export interface DocumentListFilter {
  ownerUserId?: string;
  batchId?: string;
}

export interface DocumentPage {
  data: Document[];
  total: number;
  hasNextPage: boolean;
}

export interface DocumentDeletion {
  documentId: string;
  databaseDeleted: boolean;
  storageDeleted: boolean;
}

export const MAX_LIST_LIMIT = 100;

/**
 * DocumentCatalogDomainService
 *
 * Read and delete access to persisted documents. An owner filter that does
 * not match raises DeniedError, which the HTTP layer reports as not found.
 */
@Injectable()
export class DocumentCatalogDomainService {
  private readonly logger = new Logger(DocumentCatalogDomainService.name);

  constructor(
    @Inject('DocumentRepositoryPort')
    private readonly documentRepository: DocumentRepositoryPort,
    @Inject('StorageServicePort')
    private readonly storageService: StorageServicePort,
    private readonly auditService: AuditService,
  ) {}

  async listDocuments(
    filter: DocumentListFilter,
    limit: number,
    skip: number,
  ): Promise<DocumentPage> {
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
      throw new ValidationError(
        `limit must be between 1 and ${MAX_LIST_LIMIT}`,
      );
    }
    if (!Number.isInteger(skip) || skip < 0) {
      throw new ValidationError('skip must be a non-negative integer');
    }

    const { items, totalFound } = await this.documentRepository.findMany(
      filter,
      limit,
      skip,
    );

    return {
      data: items,
      total: totalFound,
      hasNextPage: skip + items.length < totalFound,
    };
  }

  /**
   * @throws NotFoundError when the document does not exist
   * @throws DeniedError when it belongs to another owner
   */
  async getDocument(documentId: string, ownerUserId?: string): Promise<Document> {
    const document = await this.documentRepository.findById(documentId);
    if (!document) {
      throw new NotFoundError('Document not found');
    }

    if (ownerUserId !== undefined && document.ownerUserId !== ownerUserId) {
      this.logger.warn(
        `[CATALOG] Owner mismatch for document ${documentId}`,
      );
      this.auditService.logDocumentEvent({
        event: DocumentEventType.DOCUMENT_ACCESSED,
        documentId,
        userId: ownerUserId,
        success: false,
        errorMessage: 'Owner mismatch',
      });
      throw new DeniedError('Document belongs to another owner');
    }

    this.auditService.logDocumentEvent({
      event: DocumentEventType.DOCUMENT_ACCESSED,
      documentId,
      userId: ownerUserId,
      success: true,
    });

    return document;
  }

  /**
   * Remove the record, then its blob. A failed blob delete is reported in
   * the result rather than thrown.
   */
  async deleteDocument(
    documentId: string,
    ownerUserId?: string,
  ): Promise<DocumentDeletion> {
    const document = await this.getDocument(documentId, ownerUserId);

    const databaseDeleted = await this.documentRepository.delete(documentId);

    let storageDeleted = false;
    if (databaseDeleted && document.storage) {
      try {
        storageDeleted = await this.storageService.delete(
          document.storage.blobName,
        );
      } catch (error) {
        this.logger.error(
          `[CATALOG] Blob delete failed for document ${documentId}: ${sanitizeErrorMessage(errorMessageOf(error))}`,
        );
      }
    }

    this.auditService.logDocumentEvent({
      event: DocumentEventType.DOCUMENT_DELETED,
      documentId,
      userId: ownerUserId,
      success: databaseDeleted,
      metadata: { storageDeleted },
    });

    return { documentId, databaseDeleted, storageDeleted };
  }
}
