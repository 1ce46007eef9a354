import { Injectable } from '@nestjs/common';
import {
  PatientSearchDomainService,
  PatientSearchResult,
} from './domain/services/patient-search.domain.service';
import { toDocumentResponseDto } from '../document-processing/dto/document-response.dto';
import {
  PatientDocumentsQueryDto,
  PatientSearchQueryDto,
  PatientSuggestionQueryDto,
} from './dto/patient-search-query.dto';
import {
  PatientSearchResponseDto,
  PatientSuggestionsResponseDto,
} from './dto/patient-search-response.dto';

/**
 * Application facade over PatientSearchDomainService: DTO in, DTO out.
 */
@Injectable()
export class PatientSearchService {
  constructor(private readonly domainService: PatientSearchDomainService) {}

  async searchPatients(
    query: PatientSearchQueryDto,
  ): Promise<PatientSearchResponseDto> {
    const result = await this.domainService.searchPatients({
      searchTerm: query.searchTerm,
      ownerUserId: query.userId,
      minSimilarity: query.minSimilarity,
      limit: query.limit,
      skip: query.skip,
    });
    return this.toResponseDto(result);
  }

  async documentsForPatient(
    patientName: string,
    query: PatientDocumentsQueryDto,
  ): Promise<PatientSearchResponseDto> {
    const result = await this.domainService.documentsForPatient(
      patientName,
      query.userId,
      query.limit,
      query.skip,
    );
    return this.toResponseDto(result);
  }

  async suggestPatientNames(
    query: PatientSuggestionQueryDto,
  ): Promise<PatientSuggestionsResponseDto> {
    return this.domainService.suggestPatientNames(
      query.partialTerm,
      query.userId,
      query.limit,
    );
  }

  private toResponseDto(result: PatientSearchResult): PatientSearchResponseDto {
    return {
      ...result,
      documents: result.documents.map((entry) => ({
        document: toDocumentResponseDto(entry.document),
        similarityScore: entry.score,
        matchType: entry.matchType,
      })),
    };
  }
}
