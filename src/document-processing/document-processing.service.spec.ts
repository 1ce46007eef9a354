import { Test, TestingModule } from '@nestjs/testing';
import { DocumentProcessingService } from './document-processing.service';
import { IngestionPipelineDomainService } from './domain/services/ingestion-pipeline.domain.service';
import { DocumentCatalogDomainService } from './domain/services/document-catalog.domain.service';
import { Document } from './domain/entities/document.entity';
import { BatchResult } from './domain/entities/batch-result.entity';
import { ProcessingStatus } from './domain/enums/processing-status.enum';
import { BatchStatus } from './domain/enums/batch-status.enum';
import { DomainErrorKind } from '../utils/errors/domain.error';

function buildDocument(): Document {
  const document = new Document({
    id: 'doc-1',
    processingId: 'proc-1',
    fileName: '100_PEREZ, ANA_200_LAB.pdf',
    contentType: 'application/pdf',
    fileSize: 42,
    status: ProcessingStatus.COMPLETED,
    createdAt: new Date('2024-05-01T08:00:00Z'),
  });
  document.storage = {
    blobName: 'raw/abc_100_PEREZ, ANA_200_LAB.pdf',
    blobUrl: 'gs://test-bucket/raw/abc_100_PEREZ, ANA_200_LAB.pdf',
    containerName: 'test-bucket',
  };
  document.extractedText = 'Hemoglobina 13.5';
  document.ocrSummary = {
    pageCount: 1,
    processingTimeSeconds: 0.5,
    textExtracted: true,
  };
  document.categoria = 'LAB';
  document.normalizedPatientName = 'PEREZ, ANA';
  document.medicalInfoValid = true;
  return document;
}

describe('DocumentProcessingService', () => {
  let service: DocumentProcessingService;
  let mockIngestion: {
    ingestDocument: jest.Mock;
    ingestBatch: jest.Mock;
  };
  let mockCatalog: {
    listDocuments: jest.Mock;
    getDocument: jest.Mock;
    deleteDocument: jest.Mock;
  };

  beforeEach(async () => {
    mockIngestion = {
      ingestDocument: jest.fn(),
      ingestBatch: jest.fn(),
    };
    mockCatalog = {
      listDocuments: jest.fn(),
      getDocument: jest.fn(),
      deleteDocument: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DocumentProcessingService,
        { provide: IngestionPipelineDomainService, useValue: mockIngestion },
        { provide: DocumentCatalogDomainService, useValue: mockCatalog },
      ],
    }).compile();

    service = module.get<DocumentProcessingService>(DocumentProcessingService);
  });

  describe('uploadDocument', () => {
    it('should return the response DTO without OCR text or storage location', async () => {
      mockIngestion.ingestDocument.mockResolvedValue(buildDocument());

      const response = await service.uploadDocument(
        { buffer: Buffer.from('x'), originalName: 'a.pdf' },
        { ownerUserId: 'user-1' },
      );

      expect(response.id).toBe('doc-1');
      expect(response.categoria).toBe('LAB');
      expect(response.categoriaLabel).toBe('Laboratorio');
      expect(response.pageCount).toBe(1);
      expect(response.textExtracted).toBe(true);
      expect(response.extractedText).toBeUndefined();
      expect(Object.keys(response)).not.toContain('storage');
    });
  });

  describe('getDocument', () => {
    it('should include OCR text and pass the owner filter through', async () => {
      mockCatalog.getDocument.mockResolvedValue(buildDocument());

      const response = await service.getDocument('doc-1', 'user-1');

      expect(mockCatalog.getDocument).toHaveBeenCalledWith('doc-1', 'user-1');
      expect(response.extractedText).toBe('Hemoglobina 13.5');
    });
  });

  describe('listDocuments', () => {
    it('should map query fields to the catalog filter', async () => {
      mockCatalog.listDocuments.mockResolvedValue({
        data: [buildDocument()],
        total: 3,
        hasNextPage: true,
      });

      const response = await service.listDocuments({
        userId: 'user-1',
        batchId: undefined,
        limit: 1,
        skip: 0,
      });

      expect(mockCatalog.listDocuments).toHaveBeenCalledWith(
        { ownerUserId: 'user-1', batchId: undefined },
        1,
        0,
      );
      expect(response.total).toBe(3);
      expect(response.hasNextPage).toBe(true);
      expect(response.data.map((d) => d.id)).toEqual(['doc-1']);
    });
  });

  describe('uploadBatch', () => {
    it('should convert successes and keep failures as data', async () => {
      const result: BatchResult = {
        batchId: 'batch-1',
        batchTimestamp: new Date('2024-05-01T08:00:00Z'),
        totalFiles: 2,
        processedCount: 1,
        failedCount: 1,
        successRate: 50,
        status: BatchStatus.PARTIAL_SUCCESS,
        successful: [{ index: 0, document: buildDocument() }],
        failed: [
          {
            index: 1,
            fileName: 'b.pdf',
            errorKind: DomainErrorKind.STORAGE,
            error: 'Failed to upload document to storage',
          },
        ],
        summary: {
          totalSizeBytes: 84,
          successfulSizeBytes: 42,
          processingDurationSeconds: 0.2,
        },
      };
      mockIngestion.ingestBatch.mockResolvedValue(result);

      const response = await service.uploadBatch([], {});

      expect(response.status).toBe(BatchStatus.PARTIAL_SUCCESS);
      expect(response.successful[0].index).toBe(0);
      expect(response.successful[0].document.id).toBe('doc-1');
      expect(response.failed).toEqual([
        {
          index: 1,
          fileName: 'b.pdf',
          errorKind: DomainErrorKind.STORAGE,
          error: 'Failed to upload document to storage',
        },
      ]);
    });
  });
});
