import { Injectable } from '@nestjs/common';
import {
  IncomingFile,
  IngestionOptions,
  IngestionPipelineDomainService,
} from './domain/services/ingestion-pipeline.domain.service';
import { DocumentCatalogDomainService } from './domain/services/document-catalog.domain.service';
import {
  DocumentResponseDto,
  toDocumentResponseDto,
} from './dto/document-response.dto';
import { BatchUploadResponseDto } from './dto/batch-upload-response.dto';
import { DocumentListQueryDto } from './dto/document-list-query.dto';
import { DocumentListResponseDto } from './dto/document-list-response.dto';
import { DocumentDeleteResponseDto } from './dto/document-delete-response.dto';

/**
 * Orchestration Service (Application Layer)
 *
 * Thin facade over the domain services that handles DTO transformations.
 * Business logic lives in the domain services.
 */
@Injectable()
export class DocumentProcessingService {
  constructor(
    private readonly ingestionService: IngestionPipelineDomainService,
    private readonly catalogService: DocumentCatalogDomainService,
  ) {}

  async uploadDocument(
    file: IncomingFile,
    options: IngestionOptions,
  ): Promise<DocumentResponseDto> {
    const document = await this.ingestionService.ingestDocument(file, options);
    return toDocumentResponseDto(document);
  }

  async uploadBatch(
    files: IncomingFile[],
    options: IngestionOptions,
  ): Promise<BatchUploadResponseDto> {
    const result = await this.ingestionService.ingestBatch(files, options);
    return BatchUploadResponseDto.fromDomain(result);
  }

  async listDocuments(
    query: DocumentListQueryDto,
  ): Promise<DocumentListResponseDto> {
    const page = await this.catalogService.listDocuments(
      { ownerUserId: query.userId, batchId: query.batchId },
      query.limit ?? 20,
      query.skip ?? 0,
    );

    return {
      data: page.data.map((document) => toDocumentResponseDto(document)),
      total: page.total,
      hasNextPage: page.hasNextPage,
    };
  }

  async getDocument(
    documentId: string,
    ownerUserId?: string,
  ): Promise<DocumentResponseDto> {
    const document = await this.catalogService.getDocument(
      documentId,
      ownerUserId,
    );
    return toDocumentResponseDto(document, { includeText: true });
  }

  async deleteDocument(
    documentId: string,
    ownerUserId?: string,
  ): Promise<DocumentDeleteResponseDto> {
    return this.catalogService.deleteDocument(documentId, ownerUserId);
  }
}
