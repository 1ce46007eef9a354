import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Expose, plainToClass } from 'class-transformer';
import { Document } from '../domain/entities/document.entity';
import { ProcessingStatus } from '../domain/enums/processing-status.enum';
import {
  MEDICAL_CATEGORY_LABELS,
  isMedicalCategory,
} from '../domain/enums/medical-category.enum';

export class DocumentResponseDto {
  @ApiProperty()
  @Expose()
  id!: string;

  @ApiProperty({ description: 'Correlation token of the ingestion attempt' })
  @Expose()
  processingId!: string;

  @ApiPropertyOptional()
  @Expose()
  batchId?: string;

  @ApiPropertyOptional({ description: 'Zero-based position in the batch' })
  @Expose()
  batchIndex?: number;

  @ApiProperty()
  @Expose()
  fileName!: string;

  @ApiProperty()
  @Expose()
  contentType!: string;

  @ApiProperty({ description: 'Size in bytes' })
  @Expose()
  fileSize!: number;

  @ApiPropertyOptional()
  @Expose()
  ownerUserId?: string;

  @ApiPropertyOptional()
  @Expose()
  description?: string;

  @ApiProperty({ type: [String] })
  @Expose()
  tags!: string[];

  @ApiProperty({ enum: ProcessingStatus })
  @Expose()
  status!: ProcessingStatus;

  @ApiPropertyOptional()
  @Expose()
  errorMessage?: string;

  @ApiPropertyOptional({ description: 'Record number' })
  @Expose()
  expediente?: string;

  @ApiPropertyOptional()
  @Expose()
  nombrePaciente?: string;

  @ApiPropertyOptional({ description: 'Search key derived from the name' })
  @Expose()
  normalizedPatientName?: string;

  @ApiPropertyOptional()
  @Expose()
  numeroEpisodio?: string;

  @ApiPropertyOptional({ example: 'LAB' })
  @Expose()
  categoria?: string;

  @ApiPropertyOptional({ example: 'Laboratorio' })
  @Expose()
  categoriaLabel?: string;

  @ApiProperty()
  @Expose()
  medicalInfoValid!: boolean;

  @ApiPropertyOptional()
  @Expose()
  medicalInfoError?: string;

  @ApiProperty()
  @Expose()
  pageCount!: number;

  @ApiProperty()
  @Expose()
  ocrProcessingTimeSeconds!: number;

  @ApiProperty()
  @Expose()
  textExtracted!: boolean;

  @ApiPropertyOptional({
    description: 'OCR text, only returned when fetching a single document',
  })
  @Expose()
  extractedText?: string;

  @ApiProperty()
  @Expose()
  createdAt!: Date;

  @ApiProperty()
  @Expose()
  updatedAt!: Date;

  // SECURITY: storage locations are never exposed
}

/**
 * Transform domain entity to response DTO.
 * OCR text is left out unless `includeText` is set.
 */
export function toDocumentResponseDto(
  document: Document,
  options: { includeText?: boolean } = {},
): DocumentResponseDto {
  const categoria = document.categoria;

  return plainToClass(
    DocumentResponseDto,
    {
      id: document.id,
      processingId: document.processingId,
      batchId: document.batchId,
      batchIndex: document.batchIndex,
      fileName: document.fileName,
      contentType: document.contentType,
      fileSize: document.fileSize,
      ownerUserId: document.ownerUserId,
      description: document.description,
      tags: document.tags,
      status: document.status,
      errorMessage: document.errorMessage,
      expediente: document.expediente,
      nombrePaciente: document.nombrePaciente,
      normalizedPatientName: document.normalizedPatientName,
      numeroEpisodio: document.numeroEpisodio,
      categoria,
      categoriaLabel:
        categoria && isMedicalCategory(categoria)
          ? MEDICAL_CATEGORY_LABELS[categoria]
          : undefined,
      medicalInfoValid: document.medicalInfoValid,
      medicalInfoError: document.medicalInfoError,
      pageCount: document.ocrSummary.pageCount,
      ocrProcessingTimeSeconds: document.ocrSummary.processingTimeSeconds,
      textExtracted: document.ocrSummary.textExtracted,
      extractedText: options.includeText ? document.extractedText : undefined,
      createdAt: document.createdAt,
      updatedAt: document.updatedAt,
    },
    { excludeExtraneousValues: true },
  );
}
