import { Inject, Injectable, Logger } from '@nestjs/common';
import { DocumentRepositoryPort } from '../document-processing/domain/ports/document.repository.port';
import { ValidationError } from '../utils/errors/domain.error';

export interface StatisticsPeriod {
  startDate?: Date;
  endDate?: Date;
}

export interface StatisticsOverview {
  totals: {
    documents: number;
    uniqueUsers: number;
    completed: number;
    failed: number;
    validMedicalInfo: number;
  };
  storage: {
    totalSizeBytes: number;
    averageSizeBytes: number;
    maxSizeBytes: number;
    totalSizeMb: number;
    averageSizeMb: number;
    maxSizeMb: number;
  };
  categories: Record<string, number>;
  period: {
    startDate: string | null;
    endDate: string | null;
    filtered: boolean;
  };
}

const BYTES_PER_MB = 1024 * 1024;

function toMegabytes(bytes: number): number {
  return Math.round((bytes / BYTES_PER_MB) * 100) / 100;
}

@Injectable()
export class StatisticsService {
  private readonly logger = new Logger(StatisticsService.name);

  constructor(
    @Inject('DocumentRepositoryPort')
    private readonly documentRepository: DocumentRepositoryPort,
  ) {}

  async getOverview(period: StatisticsPeriod = {}): Promise<StatisticsOverview> {
    const { startDate, endDate } = period;
    if (startDate && endDate && startDate > endDate) {
      throw new ValidationError('startDate must not be after endDate');
    }

    const overview = await this.documentRepository.getOverview({
      startDate,
      endDate,
    });

    const filtered = Boolean(startDate || endDate);
    this.logger.log(
      `[STATISTICS] Overview computed over ${overview.totalDocuments} documents${filtered ? ' (filtered)' : ''}`,
    );

    return {
      totals: {
        documents: overview.totalDocuments,
        uniqueUsers: overview.uniqueOwners,
        completed: overview.completedDocuments,
        failed: overview.failedDocuments,
        validMedicalInfo: overview.validMedicalInfo,
      },
      storage: {
        totalSizeBytes: overview.totalSizeBytes,
        averageSizeBytes: Math.round(overview.averageSizeBytes),
        maxSizeBytes: overview.maxSizeBytes,
        totalSizeMb: toMegabytes(overview.totalSizeBytes),
        averageSizeMb: toMegabytes(overview.averageSizeBytes),
        maxSizeMb: toMegabytes(overview.maxSizeBytes),
      },
      categories: overview.categories,
      period: {
        startDate: startDate ? startDate.toISOString() : null,
        endDate: endDate ? endDate.toISOString() : null,
        filtered,
      },
    };
  }
}
