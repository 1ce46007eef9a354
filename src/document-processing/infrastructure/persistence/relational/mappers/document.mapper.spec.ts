import { DocumentMapper } from './document.mapper';
import { DocumentEntity } from '../entities/document.entity';
import { Document } from '../../../../domain/entities/document.entity';
import { ProcessingStatus } from '../../../../domain/enums/processing-status.enum';

describe('DocumentMapper', () => {
  const createdAt = new Date('2024-05-01T08:00:00Z');

  it('should flatten storage and OCR summary into columns', () => {
    const domain = new Document({
      id: '7b1f3c1e-0000-4000-8000-000000000001',
      processingId: '7b1f3c1e-0000-4000-8000-000000000002',
      fileName: '1_PEREZ, JUAN_2_LAB.pdf',
      contentType: 'application/pdf',
      fileSize: 2048,
      status: ProcessingStatus.COMPLETED,
      createdAt,
    });
    domain.storage = {
      blobName: 'raw/abc.pdf',
      blobUrl: 'gs://test-bucket/raw/abc.pdf',
      containerName: 'test-bucket',
    };
    domain.ocrSummary = {
      pageCount: 3,
      processingTimeSeconds: 2.25,
      textExtracted: true,
    };
    domain.normalizedPatientName = 'PEREZ, JUAN';
    domain.medicalInfoValid = true;

    const entity = DocumentMapper.toPersistence(domain);

    expect(entity.blobName).toBe('raw/abc.pdf');
    expect(entity.containerName).toBe('test-bucket');
    expect(entity.pageCount).toBe(3);
    expect(entity.ocrProcessingTimeSeconds).toBe(2.25);
    expect(entity.batchId).toBeNull();
    expect(entity.normalizedPatientName).toBe('PEREZ, JUAN');
  });

  it('should map null columns to absent domain fields', () => {
    const entity = new DocumentEntity();
    Object.assign(entity, {
      id: 'doc-1',
      processingId: 'proc-1',
      batchId: null,
      batchIndex: null,
      fileName: 'scan.pdf',
      contentType: 'application/pdf',
      fileSize: 10,
      ownerUserId: null,
      description: null,
      tags: [],
      blobName: 'raw/scan.pdf',
      blobUrl: null,
      containerName: 'test-bucket',
      extractedText: null,
      pageCount: 0,
      ocrProcessingTimeSeconds: 0,
      textExtracted: false,
      expediente: null,
      nombrePaciente: null,
      normalizedPatientName: null,
      numeroEpisodio: null,
      categoria: null,
      medicalInfoValid: false,
      medicalInfoError: 'Filename has missing components',
      status: ProcessingStatus.FAILED,
      errorMessage: 'OCR failed: timeout',
      createdAt,
      updatedAt: createdAt,
    });

    const domain = DocumentMapper.toDomain(entity);

    // Partial storage columns never produce a storage reference
    expect(domain.storage).toBeUndefined();
    expect(domain.ownerUserId).toBeUndefined();
    expect(domain.normalizedPatientName).toBeUndefined();
    expect(domain.medicalInfoError).toBe('Filename has missing components');
    expect(domain.status).toBe(ProcessingStatus.FAILED);
    expect(domain.errorMessage).toBe('OCR failed: timeout');
  });
});
