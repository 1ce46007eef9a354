import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DocumentRepositoryPort } from '../../../document-processing/domain/ports/document.repository.port';
import { Document } from '../../../document-processing/domain/entities/document.entity';
import { normalizePatientName } from '../utils/name-normalizer';
import {
  MATCH_TYPE_ORDER,
  MatchType,
  containmentAnchor,
  scoreSimilarity,
} from '../utils/similarity-scorer';
import { AuditService, DocumentEventType } from '../../../audit/audit.service';
import { AllConfigType } from '../../../config/config.type';
import { ValidationError } from '../../../utils/errors/domain.error';

export interface ScoredDocument {
  document: Document;
  score: number;
  matchType: MatchType;
}

export interface PatientSearchQuery {
  searchTerm: string;
  ownerUserId?: string;
  minSimilarity?: number;
  limit?: number;
  skip?: number;
}

export interface PatientSearchResult {
  searchTerm: string;
  normalizedTerm: string;
  documents: ScoredDocument[];
  totalFound: number;
  limit: number;
  skip: number;
  hasNext: boolean;
  hasPrev: boolean;
  totalPages: number;
  strategiesUsed: MatchType[];
  minSimilarity: number;
}

export interface PatientNameSuggestion {
  name: string;
  score: number;
  matchType: MatchType;
  documentCount: number;
}

export interface PatientSuggestionResult {
  partialTerm: string;
  normalizedTerm: string;
  suggestions: PatientNameSuggestion[];
}

export const MAX_SEARCH_LIMIT = 100;
export const MAX_SUGGESTION_LIMIT = 50;
export const DEFAULT_SEARCH_LIMIT = 20;

// Lower bound of the prefix band
export const PATIENT_DOCUMENTS_MIN_SIMILARITY = 0.8;

const SUGGESTION_MATCH_TYPES: readonly MatchType[] = [
  MatchType.EXACT,
  MatchType.PREFIX,
  MatchType.SUBSTRING,
];
const PATIENT_DOCUMENT_MATCH_TYPES: readonly MatchType[] = [
  MatchType.EXACT,
  MatchType.PREFIX,
];

/**
 * PatientSearchDomainService
 *
 * Ranks documents by how closely their normalized patient name matches a
 * query. Exact, prefix and substring candidates are fetched from every
 * document; fuzzy and word-overlap candidates come from the newest
 * `candidateCap` documents. Candidates are scored in memory.
 *
 * Ordering: score desc, shorter name, name, document id.
 */
@Injectable()
export class PatientSearchDomainService {
  private readonly logger = new Logger(PatientSearchDomainService.name);

  constructor(
    @Inject('DocumentRepositoryPort')
    private readonly documentRepository: DocumentRepositoryPort,
    private readonly auditService: AuditService,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  async searchPatients(query: PatientSearchQuery): Promise<PatientSearchResult> {
    return this.search(query, MATCH_TYPE_ORDER);
  }

  /**
   * Documents for one patient: exact and prefix matches only.
   */
  async documentsForPatient(
    patientName: string,
    ownerUserId?: string,
    limit: number = DEFAULT_SEARCH_LIMIT,
    skip = 0,
  ): Promise<PatientSearchResult> {
    return this.search(
      {
        searchTerm: patientName,
        ownerUserId,
        minSimilarity: PATIENT_DOCUMENTS_MIN_SIMILARITY,
        limit,
        skip,
      },
      PATIENT_DOCUMENT_MATCH_TYPES,
    );
  }

  /**
   * Distinct normalized names matching exactly, by prefix or by substring.
   * Ordered by score, then number of documents, then name.
   */
  async suggestPatientNames(
    partialTerm: string,
    ownerUserId?: string,
    limit = 10,
  ): Promise<PatientSuggestionResult> {
    const normalizedTerm = this.normalizeTerm(partialTerm);
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_SUGGESTION_LIMIT) {
      throw new ValidationError(
        `limit must be between 1 and ${MAX_SUGGESTION_LIMIT}`,
      );
    }

    const candidates = await this.fetchCandidates(normalizedTerm, ownerUserId);

    const frequency = new Map<string, number>();
    for (const document of candidates) {
      const name = document.normalizedPatientName;
      if (name) {
        frequency.set(name, (frequency.get(name) ?? 0) + 1);
      }
    }

    const fuzzyThreshold = this.fuzzyThreshold();
    const suggestions: PatientNameSuggestion[] = [];
    frequency.forEach((documentCount, name) => {
      const match = scoreSimilarity(normalizedTerm, name, fuzzyThreshold);
      if (match && SUGGESTION_MATCH_TYPES.includes(match.matchType)) {
        suggestions.push({ name, documentCount, ...match });
      }
    });

    suggestions.sort(
      (a, b) =>
        b.score - a.score ||
        b.documentCount - a.documentCount ||
        compareStrings(a.name, b.name),
    );

    return {
      partialTerm,
      normalizedTerm,
      suggestions: suggestions.slice(0, limit),
    };
  }

  private async search(
    query: PatientSearchQuery,
    allowedMatchTypes: readonly MatchType[],
  ): Promise<PatientSearchResult> {
    const normalizedTerm = this.normalizeTerm(query.searchTerm);
    const limit = query.limit ?? DEFAULT_SEARCH_LIMIT;
    const skip = query.skip ?? 0;
    const minSimilarity =
      query.minSimilarity ??
      this.configService.getOrThrow('patientSearch.defaultMinSimilarity', {
        infer: true,
      });

    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_SEARCH_LIMIT) {
      throw new ValidationError(`limit must be between 1 and ${MAX_SEARCH_LIMIT}`);
    }
    if (!Number.isInteger(skip) || skip < 0) {
      throw new ValidationError('skip must be a non-negative integer');
    }
    if (Number.isNaN(minSimilarity) || minSimilarity < 0 || minSimilarity > 1) {
      throw new ValidationError('minSimilarity must be between 0 and 1');
    }

    const candidates = await this.fetchCandidates(
      normalizedTerm,
      query.ownerUserId,
    );
    const fuzzyThreshold = this.fuzzyThreshold();

    const ranked: ScoredDocument[] = [];
    for (const document of candidates) {
      if (!document.normalizedPatientName) {
        continue;
      }
      const match = scoreSimilarity(
        normalizedTerm,
        document.normalizedPatientName,
        fuzzyThreshold,
      );
      if (
        match &&
        match.score >= minSimilarity &&
        allowedMatchTypes.includes(match.matchType)
      ) {
        ranked.push({ document, ...match });
      }
    }
    ranked.sort(compareScoredDocuments);

    const totalFound = ranked.length;
    const present = new Set(ranked.map((entry) => entry.matchType));

    this.logger.log(
      `[SEARCH] ${candidates.length} candidates scored, ${totalFound} matched`,
    );
    this.auditService.logDocumentEvent({
      event: DocumentEventType.PATIENT_SEARCH,
      userId: query.ownerUserId,
      success: true,
      metadata: { candidates: candidates.length, totalFound },
    });

    return {
      searchTerm: query.searchTerm,
      normalizedTerm,
      documents: ranked.slice(skip, skip + limit),
      totalFound,
      limit,
      skip,
      hasNext: skip + limit < totalFound,
      hasPrev: skip > 0,
      totalPages: Math.ceil(totalFound / limit),
      strategiesUsed: MATCH_TYPE_ORDER.filter((type) => present.has(type)),
      minSimilarity,
    };
  }

  private normalizeTerm(term: string): string {
    const normalized = normalizePatientName(term ?? '');
    if (!normalized) {
      throw new ValidationError(
        'Search term is empty',
        'Provide at least one letter or digit of the patient name',
      );
    }
    return normalized;
  }

  private async fetchCandidates(
    normalizedTerm: string,
    ownerUserId?: string,
  ): Promise<Document[]> {
    const [nameMatches, recent] = await Promise.all([
      this.documentRepository.findCandidates({
        ownerUserId,
        hasNormalizedName: true,
        normalizedNameContains: containmentAnchor(normalizedTerm),
      }),
      this.documentRepository.findCandidates(
        { ownerUserId, hasNormalizedName: true },
        this.configService.getOrThrow('patientSearch.candidateCap', {
          infer: true,
        }),
      ),
    ]);

    const byId = new Map<string, Document>();
    for (const document of [...nameMatches, ...recent]) {
      if (!byId.has(document.id)) {
        byId.set(document.id, document);
      }
    }
    return [...byId.values()];
  }

  private fuzzyThreshold(): number {
    return this.configService.getOrThrow('patientSearch.fuzzyThreshold', {
      infer: true,
    });
  }
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareScoredDocuments(a: ScoredDocument, b: ScoredDocument): number {
  const nameA = a.document.normalizedPatientName ?? '';
  const nameB = b.document.normalizedPatientName ?? '';

  return (
    b.score - a.score ||
    nameA.length - nameB.length ||
    compareStrings(nameA, nameB) ||
    compareStrings(a.document.id, b.document.id)
  );
}
