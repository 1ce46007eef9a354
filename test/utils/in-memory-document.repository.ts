import {
  DocumentFilter,
  DocumentOverview,
  DocumentRepositoryPort,
  InsertOutcome,
} from '../../src/document-processing/domain/ports/document.repository.port';
import { Document } from '../../src/document-processing/domain/entities/document.entity';
import { ProcessingStatus } from '../../src/document-processing/domain/enums/processing-status.enum';
import { NullableType } from '../../src/utils/types/nullable.type';

/**
 * In-process stand-in for the relational repository. Applies the same
 * filters and newest-first ordering.
 */
export class InMemoryDocumentRepository implements DocumentRepositoryPort {
  private readonly documents = new Map<string, Document>();

  async insertOne(document: Document): Promise<Document> {
    this.documents.set(document.id, document);
    return document;
  }

  async insertMany(documents: Document[]): Promise<InsertOutcome[]> {
    return documents.map((document) => {
      this.documents.set(document.id, document);
      return { ok: true as const, id: document.id };
    });
  }

  async findById(id: string): Promise<NullableType<Document>> {
    return this.documents.get(id) ?? null;
  }

  async findMany(
    filter: DocumentFilter,
    limit: number,
    skip: number,
  ): Promise<{ items: Document[]; totalFound: number }> {
    const matching = this.filtered(filter);
    return {
      items: matching.slice(skip, skip + limit),
      totalFound: matching.length,
    };
  }

  async findCandidates(filter: DocumentFilter, cap?: number): Promise<Document[]> {
    const matching = this.filtered(filter);
    return cap === undefined ? matching : matching.slice(0, cap);
  }

  async getOverview(period: {
    startDate?: Date;
    endDate?: Date;
  }): Promise<DocumentOverview> {
    const documents = [...this.documents.values()].filter(
      (document) =>
        (!period.startDate || document.createdAt >= period.startDate) &&
        (!period.endDate || document.createdAt <= period.endDate),
    );
    const sizes = documents.map((document) => document.fileSize);
    const totalSizeBytes = sizes.reduce((sum, size) => sum + size, 0);

    const categories: Record<string, number> = {};
    for (const document of documents) {
      if (document.categoria) {
        categories[document.categoria] =
          (categories[document.categoria] ?? 0) + 1;
      }
    }

    return {
      totalDocuments: documents.length,
      uniqueOwners: new Set(
        documents
          .map((document) => document.ownerUserId)
          .filter((owner) => owner !== undefined),
      ).size,
      completedDocuments: documents.filter(
        (document) => document.status === ProcessingStatus.COMPLETED,
      ).length,
      failedDocuments: documents.filter(
        (document) => document.status === ProcessingStatus.FAILED,
      ).length,
      validMedicalInfo: documents.filter((document) => document.medicalInfoValid)
        .length,
      totalSizeBytes,
      averageSizeBytes: documents.length ? totalSizeBytes / documents.length : 0,
      maxSizeBytes: sizes.length ? Math.max(...sizes) : 0,
      categories,
    };
  }

  async delete(id: string): Promise<boolean> {
    return this.documents.delete(id);
  }

  get size(): number {
    return this.documents.size;
  }

  private filtered(filter: DocumentFilter): Document[] {
    return [...this.documents.values()]
      .filter((document) => {
        const name = document.normalizedPatientName;
        return (
          (filter.ownerUserId === undefined ||
            document.ownerUserId === filter.ownerUserId) &&
          (filter.batchId === undefined || document.batchId === filter.batchId) &&
          (!filter.hasNormalizedName || name !== undefined) &&
          (!filter.normalizedNamePrefix ||
            (name?.startsWith(filter.normalizedNamePrefix) ?? false)) &&
          (!filter.normalizedNameContains ||
            (name?.includes(filter.normalizedNameContains) ?? false))
        );
      })
      .sort(
        (a, b) =>
          b.createdAt.getTime() - a.createdAt.getTime() ||
          (a.id < b.id ? -1 : a.id > b.id ? 1 : 0),
      );
  }
}
