import { BatchStatus } from '../enums/batch-status.enum';
import { DomainErrorKind } from '../../../utils/errors/domain.error';
import { Document } from './document.entity';

export interface BatchFailure {
  index: number;
  fileName: string;
  errorKind: DomainErrorKind;
  error: string;
}

export interface BatchSuccess {
  index: number;
  document: Document;
}

/**
 * Aggregate outcome of one batch upload call. Built once after every file
 * task has settled; never mutated afterwards.
 */
export interface BatchResult {
  batchId: string;
  batchTimestamp: Date;
  description?: string;
  ownerUserId?: string;
  totalFiles: number;
  processedCount: number;
  failedCount: number;
  successRate: number; // Percentage, 2 decimals
  status: BatchStatus;
  successful: readonly BatchSuccess[];
  failed: readonly BatchFailure[];
  summary: {
    totalSizeBytes: number;
    successfulSizeBytes: number;
    processingDurationSeconds: number;
  };
}
