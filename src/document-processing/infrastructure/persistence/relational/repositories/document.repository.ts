import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository, SelectQueryBuilder } from 'typeorm';
import {
  DocumentFilter,
  DocumentOverview,
  DocumentRepositoryPort,
  InsertOutcome,
} from '../../../../domain/ports/document.repository.port';
import { Document } from '../../../../domain/entities/document.entity';
import { ProcessingStatus } from '../../../../domain/enums/processing-status.enum';
import { DocumentEntity } from '../entities/document.entity';
import { DocumentMapper } from '../mappers/document.mapper';
import { NullableType } from '../../../../../utils/types/nullable.type';

interface OverviewRow {
  totalDocuments: string;
  uniqueOwners: string;
  completedDocuments: string;
  failedDocuments: string;
  validMedicalInfo: string;
  totalSizeBytes: string;
  averageSizeBytes: string;
  maxSizeBytes: string;
}

interface CategoryRow {
  categoria: string;
  count: string;
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, '\\$&');
}

@Injectable()
export class DocumentRepositoryAdapter implements DocumentRepositoryPort {
  private readonly logger = new Logger(DocumentRepositoryAdapter.name);

  constructor(
    @InjectRepository(DocumentEntity)
    private readonly documentRepository: Repository<DocumentEntity>,
  ) {}

  async insertOne(document: Document): Promise<Document> {
    const entity = DocumentMapper.toPersistence(document);
    const saved = await this.documentRepository.save(entity);
    return DocumentMapper.toDomain(saved);
  }

  /**
   * One multi-row INSERT. When it is rejected by a row-level constraint the
   * rows are retried one at a time so each gets its own outcome. Any other
   * failure rejects the whole call.
   */
  async insertMany(documents: Document[]): Promise<InsertOutcome[]> {
    if (documents.length === 0) {
      return [];
    }

    const entities = documents.map(DocumentMapper.toPersistence);
    try {
      await this.documentRepository.insert(entities);
      return documents.map((document) => ({
        ok: true as const,
        id: document.id,
      }));
    } catch (error) {
      if (!(error instanceof QueryFailedError)) {
        throw error;
      }
      this.logger.warn(
        `[REPOSITORY] Bulk insert of ${entities.length} documents rejected, retrying row by row`,
      );
    }

    const outcomes: InsertOutcome[] = [];
    for (const entity of entities) {
      try {
        await this.documentRepository.insert(entity);
        outcomes.push({ ok: true, id: entity.id });
      } catch (error) {
        if (!(error instanceof QueryFailedError)) {
          throw error;
        }
        outcomes.push({ ok: false, id: entity.id, error: error.message });
      }
    }
    return outcomes;
  }

  async findById(id: string): Promise<NullableType<Document>> {
    const entity = await this.documentRepository.findOne({
      where: { id },
    });
    return entity ? DocumentMapper.toDomain(entity) : null;
  }

  async findMany(
    filter: DocumentFilter,
    limit: number,
    skip: number,
  ): Promise<{ items: Document[]; totalFound: number }> {
    const [entities, totalFound] = await this.filtered(filter)
      .skip(skip)
      .take(limit)
      .getManyAndCount();

    return {
      items: entities.map(DocumentMapper.toDomain),
      totalFound,
    };
  }

  async findCandidates(
    filter: DocumentFilter,
    cap?: number,
  ): Promise<Document[]> {
    const query = this.filtered(filter);
    if (cap !== undefined) {
      query.take(cap);
    }

    const entities = await query.getMany();
    return entities.map(DocumentMapper.toDomain);
  }

  async getOverview(period: {
    startDate?: Date;
    endDate?: Date;
  }): Promise<DocumentOverview> {
    const totals = await this.inPeriod(period)
      .select('COUNT(*)', 'totalDocuments')
      .addSelect('COUNT(DISTINCT document.owner_user_id)', 'uniqueOwners')
      .addSelect(
        'COUNT(*) FILTER (WHERE document.status = :completed)',
        'completedDocuments',
      )
      .addSelect(
        'COUNT(*) FILTER (WHERE document.status = :failed)',
        'failedDocuments',
      )
      .addSelect(
        'COUNT(*) FILTER (WHERE document.medical_info_valid)',
        'validMedicalInfo',
      )
      .addSelect('COALESCE(SUM(document.file_size), 0)', 'totalSizeBytes')
      .addSelect('COALESCE(AVG(document.file_size), 0)', 'averageSizeBytes')
      .addSelect('COALESCE(MAX(document.file_size), 0)', 'maxSizeBytes')
      .setParameters({
        completed: ProcessingStatus.COMPLETED,
        failed: ProcessingStatus.FAILED,
      })
      .getRawOne<OverviewRow>();

    const categoryRows = await this.inPeriod(period)
      .select('document.categoria', 'categoria')
      .addSelect('COUNT(*)', 'count')
      .andWhere('document.categoria IS NOT NULL')
      .groupBy('document.categoria')
      .getRawMany<CategoryRow>();

    const categories: Record<string, number> = {};
    for (const row of categoryRows) {
      categories[row.categoria] = Number(row.count);
    }

    return {
      totalDocuments: Number(totals?.totalDocuments ?? 0),
      uniqueOwners: Number(totals?.uniqueOwners ?? 0),
      completedDocuments: Number(totals?.completedDocuments ?? 0),
      failedDocuments: Number(totals?.failedDocuments ?? 0),
      validMedicalInfo: Number(totals?.validMedicalInfo ?? 0),
      totalSizeBytes: Number(totals?.totalSizeBytes ?? 0),
      averageSizeBytes: Number(totals?.averageSizeBytes ?? 0),
      maxSizeBytes: Number(totals?.maxSizeBytes ?? 0),
      categories,
    };
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.documentRepository.delete(id);
    return (result.affected ?? 0) > 0;
  }

  private filtered(filter: DocumentFilter): SelectQueryBuilder<DocumentEntity> {
    const query = this.documentRepository
      .createQueryBuilder('document')
      .orderBy('document.createdAt', 'DESC')
      .addOrderBy('document.id', 'ASC');

    if (filter.ownerUserId !== undefined) {
      query.andWhere('document.owner_user_id = :ownerUserId', {
        ownerUserId: filter.ownerUserId,
      });
    }
    if (filter.batchId !== undefined) {
      query.andWhere('document.batch_id = :batchId', {
        batchId: filter.batchId,
      });
    }
    if (filter.hasNormalizedName) {
      query.andWhere('document.normalized_patient_name IS NOT NULL');
    }
    if (filter.normalizedNamePrefix) {
      query.andWhere('document.normalized_patient_name LIKE :prefix', {
        prefix: `${escapeLike(filter.normalizedNamePrefix)}%`,
      });
    }
    if (filter.normalizedNameContains) {
      query.andWhere('document.normalized_patient_name LIKE :contains', {
        contains: `%${escapeLike(filter.normalizedNameContains)}%`,
      });
    }

    return query;
  }

  private inPeriod(period: {
    startDate?: Date;
    endDate?: Date;
  }): SelectQueryBuilder<DocumentEntity> {
    const query = this.documentRepository.createQueryBuilder('document');

    if (period.startDate) {
      query.andWhere('document.created_at >= :startDate', {
        startDate: period.startDate,
      });
    }
    if (period.endDate) {
      query.andWhere('document.created_at <= :endDate', {
        endDate: period.endDate,
      });
    }

    return query;
  }
}
