import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { BatchStatus } from '../domain/enums/batch-status.enum';
import { BatchResult } from '../domain/entities/batch-result.entity';
import { DomainErrorKind } from '../../utils/errors/domain.error';
import {
  DocumentResponseDto,
  toDocumentResponseDto,
} from './document-response.dto';

export class BatchSuccessDto {
  @ApiProperty({ description: 'Zero-based position of the file in the request' })
  index!: number;

  @ApiProperty({ type: DocumentResponseDto })
  document!: DocumentResponseDto;
}

export class BatchFailureDto {
  @ApiProperty()
  index!: number;

  @ApiProperty()
  fileName!: string;

  @ApiProperty({ enum: DomainErrorKind })
  errorKind!: DomainErrorKind;

  @ApiProperty()
  error!: string;
}

export class BatchSummaryDto {
  @ApiProperty()
  totalSizeBytes!: number;

  @ApiProperty()
  successfulSizeBytes!: number;

  @ApiProperty()
  processingDurationSeconds!: number;
}

export class BatchUploadResponseDto {
  @ApiProperty()
  batchId!: string;

  @ApiProperty()
  batchTimestamp!: Date;

  @ApiPropertyOptional()
  description?: string;

  @ApiProperty()
  totalFiles!: number;

  @ApiProperty()
  processedCount!: number;

  @ApiProperty()
  failedCount!: number;

  @ApiProperty({ description: 'Percentage of processed files', example: 66.67 })
  successRate!: number;

  @ApiProperty({ enum: BatchStatus })
  status!: BatchStatus;

  @ApiProperty({ type: [BatchSuccessDto] })
  successful!: BatchSuccessDto[];

  @ApiProperty({ type: [BatchFailureDto] })
  failed!: BatchFailureDto[];

  @ApiProperty({ type: BatchSummaryDto })
  summary!: BatchSummaryDto;

  static fromDomain(result: BatchResult): BatchUploadResponseDto {
    return {
      batchId: result.batchId,
      batchTimestamp: result.batchTimestamp,
      description: result.description,
      totalFiles: result.totalFiles,
      processedCount: result.processedCount,
      failedCount: result.failedCount,
      successRate: result.successRate,
      status: result.status,
      successful: result.successful.map((entry) => ({
        index: entry.index,
        document: toDocumentResponseDto(entry.document),
      })),
      failed: result.failed.map((entry) => ({ ...entry })),
      summary: { ...result.summary },
    };
  }
}
