import { Document } from '../../../../domain/entities/document.entity';
import { DocumentEntity } from '../entities/document.entity';

export class DocumentMapper {
  static toDomain(entity: DocumentEntity): Document {
    const domain = new Document({
      id: entity.id,
      processingId: entity.processingId,
      fileName: entity.fileName,
      contentType: entity.contentType,
      fileSize: entity.fileSize,
      status: entity.status,
      createdAt: entity.createdAt,
    });
    domain.batchId = entity.batchId ?? undefined;
    domain.batchIndex = entity.batchIndex ?? undefined;
    domain.ownerUserId = entity.ownerUserId ?? undefined;
    domain.description = entity.description ?? undefined;
    domain.tags = entity.tags ?? [];

    if (entity.blobName && entity.blobUrl && entity.containerName) {
      domain.storage = {
        blobName: entity.blobName,
        blobUrl: entity.blobUrl,
        containerName: entity.containerName,
      };
    }

    domain.extractedText = entity.extractedText ?? undefined;
    domain.ocrSummary = {
      pageCount: entity.pageCount,
      processingTimeSeconds: Number(entity.ocrProcessingTimeSeconds),
      textExtracted: entity.textExtracted,
    };
    domain.expediente = entity.expediente ?? undefined;
    domain.nombrePaciente = entity.nombrePaciente ?? undefined;
    domain.normalizedPatientName = entity.normalizedPatientName ?? undefined;
    domain.numeroEpisodio = entity.numeroEpisodio ?? undefined;
    domain.categoria = entity.categoria ?? undefined;
    domain.medicalInfoValid = entity.medicalInfoValid;
    domain.medicalInfoError = entity.medicalInfoError ?? undefined;
    domain.errorMessage = entity.errorMessage ?? undefined;
    domain.updatedAt = entity.updatedAt;
    return domain;
  }

  static toPersistence(domain: Document): DocumentEntity {
    const entity = new DocumentEntity();
    entity.id = domain.id;
    entity.processingId = domain.processingId;
    entity.batchId = domain.batchId ?? null;
    entity.batchIndex = domain.batchIndex ?? null;
    entity.fileName = domain.fileName;
    entity.contentType = domain.contentType;
    entity.fileSize = domain.fileSize;
    entity.ownerUserId = domain.ownerUserId ?? null;
    entity.description = domain.description ?? null;
    entity.tags = [...domain.tags];
    entity.blobName = domain.storage?.blobName ?? null;
    entity.blobUrl = domain.storage?.blobUrl ?? null;
    entity.containerName = domain.storage?.containerName ?? null;
    entity.extractedText = domain.extractedText ?? null;
    entity.pageCount = domain.ocrSummary.pageCount;
    entity.ocrProcessingTimeSeconds = domain.ocrSummary.processingTimeSeconds;
    entity.textExtracted = domain.ocrSummary.textExtracted;
    entity.expediente = domain.expediente ?? null;
    entity.nombrePaciente = domain.nombrePaciente ?? null;
    entity.normalizedPatientName = domain.normalizedPatientName ?? null;
    entity.numeroEpisodio = domain.numeroEpisodio ?? null;
    entity.categoria = domain.categoria ?? null;
    entity.medicalInfoValid = domain.medicalInfoValid;
    entity.medicalInfoError = domain.medicalInfoError ?? null;
    entity.status = domain.status;
    entity.errorMessage = domain.errorMessage ?? null;
    entity.createdAt = domain.createdAt;
    entity.updatedAt = domain.updatedAt;
    return entity;
  }
}
