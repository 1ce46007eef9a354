import { Document } from '../entities/document.entity';
import { NullableType } from '../../../utils/types/nullable.type';

export interface DocumentFilter {
  ownerUserId?: string;
  batchId?: string;
  hasNormalizedName?: boolean;
  // Normalized-name predicates (upper-case, already normalized)
  normalizedNamePrefix?: string;
  normalizedNameContains?: string;
}

export type InsertOutcome =
  | { ok: true; id: string }
  | { ok: false; id: string; error: string };

export interface DocumentOverview {
  totalDocuments: number;
  uniqueOwners: number;
  completedDocuments: number;
  failedDocuments: number;
  validMedicalInfo: number;
  totalSizeBytes: number;
  averageSizeBytes: number;
  maxSizeBytes: number;
  categories: Record<string, number>;
}

export interface DocumentRepositoryPort {
  // Create
  insertOne(document: Document): Promise<Document>;

  /**
   * Bulk insert. Resolves with one outcome per input, in input order.
   * Rejects only when the call as a whole fails.
   */
  insertMany(documents: Document[]): Promise<InsertOutcome[]>;

  // Read
  findById(id: string): Promise<NullableType<Document>>;
  findMany(
    filter: DocumentFilter,
    limit: number,
    skip: number,
  ): Promise<{ items: Document[]; totalFound: number }>;

  /**
   * Newest-first candidate fetch for in-memory ranking. Uncapped when `cap`
   * is omitted.
   */
  findCandidates(filter: DocumentFilter, cap?: number): Promise<Document[]>;

  getOverview(period: { startDate?: Date; endDate?: Date }): Promise<DocumentOverview>;

  // Delete
  delete(id: string): Promise<boolean>;
}
