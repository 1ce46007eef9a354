import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { PatientSearchDomainService } from './patient-search.domain.service';
import { DocumentRepositoryPort } from '../../../document-processing/domain/ports/document.repository.port';
import { Document } from '../../../document-processing/domain/entities/document.entity';
import { ProcessingStatus } from '../../../document-processing/domain/enums/processing-status.enum';
import { AuditService } from '../../../audit/audit.service';
import { MatchType } from '../utils/similarity-scorer';
import { ValidationError } from '../../../utils/errors/domain.error';

function buildDocument(id: string, normalizedPatientName: string): Document {
  const document = new Document({
    id,
    processingId: `proc-${id}`,
    fileName: `${id}.pdf`,
    contentType: 'application/pdf',
    fileSize: 100,
    status: ProcessingStatus.COMPLETED,
    createdAt: new Date('2024-03-01T10:00:00Z'),
  });
  document.normalizedPatientName = normalizedPatientName;
  document.medicalInfoValid = true;
  return document;
}

const CANDIDATES = [
  buildDocument('doc-1', 'ALANIS VILLAGRAN, MARIA DE LOS ANGELES'),
  buildDocument('doc-4', 'GOMEZ, ANA'),
  buildDocument('doc-3', 'GOMEZ, ANA LUISA'),
  buildDocument('doc-2', 'GOMEZ, ANA'),
  buildDocument('doc-5', 'RUIZ, PEDRO'),
];

describe('PatientSearchDomainService', () => {
  let service: PatientSearchDomainService;
  let mockRepository: jest.Mocked<DocumentRepositoryPort>;

  beforeEach(async () => {
    mockRepository = {
      insertOne: jest.fn(),
      insertMany: jest.fn(),
      findById: jest.fn(),
      findMany: jest.fn(),
      findCandidates: jest.fn(),
      getOverview: jest.fn(),
      delete: jest.fn(),
    };
    mockRepository.findCandidates.mockResolvedValue(CANDIDATES);

    const config: Record<string, number> = {
      'patientSearch.fuzzyThreshold': 0.5,
      'patientSearch.candidateCap': 500,
      'patientSearch.defaultMinSimilarity': 0.3,
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PatientSearchDomainService,
        { provide: 'DocumentRepositoryPort', useValue: mockRepository },
        { provide: AuditService, useValue: { logDocumentEvent: jest.fn() } },
        {
          provide: ConfigService,
          useValue: { getOrThrow: jest.fn((key: string) => config[key]) },
        },
      ],
    }).compile();

    service = module.get<PatientSearchDomainService>(PatientSearchDomainService);
  });

  describe('searchPatients', () => {
    it('should match a reordered partial name through shared tokens', async () => {
      const result = await service.searchPatients({ searchTerm: 'maria alanis' });

      expect(result.normalizedTerm).toBe('MARIA ALANIS');
      const alanis = result.documents.find((d) => d.document.id === 'doc-1');
      expect(alanis).toMatchObject({
        score: 0.44,
        matchType: MatchType.TEXT_SEARCH,
      });
    });

    it('should rank exact before prefix and break ties by id', async () => {
      const result = await service.searchPatients({ searchTerm: 'gomez, ana' });

      expect(
        result.documents.map((d) => [d.document.id, d.matchType, d.score]),
      ).toEqual([
        ['doc-2', MatchType.EXACT, 1],
        ['doc-4', MatchType.EXACT, 1],
        ['doc-3', MatchType.PREFIX, 0.914],
      ]);
      expect(result.totalFound).toBe(3);
      expect(result.strategiesUsed).toEqual([MatchType.EXACT, MatchType.PREFIX]);
      expect(result.minSimilarity).toBe(0.3);
    });

    it('should paginate over the full ranked list', async () => {
      const first = await service.searchPatients({
        searchTerm: 'gomez, ana',
        limit: 2,
        skip: 0,
      });
      const second = await service.searchPatients({
        searchTerm: 'gomez, ana',
        limit: 2,
        skip: 2,
      });

      expect(first).toMatchObject({
        hasNext: true,
        hasPrev: false,
        totalPages: 2,
      });
      expect(second).toMatchObject({
        hasNext: false,
        hasPrev: true,
        totalPages: 2,
      });
      expect(
        [...first.documents, ...second.documents].map((d) => d.document.id),
      ).toEqual(['doc-2', 'doc-4', 'doc-3']);
    });

    it('should drop matches below minSimilarity', async () => {
      const result = await service.searchPatients({
        searchTerm: 'gomez, ana',
        minSimilarity: 0.95,
      });

      expect(result.documents.map((d) => d.document.id)).toEqual([
        'doc-2',
        'doc-4',
      ]);
    });

    it('should fetch name matches uncapped and the fuzzy pool with the configured cap', async () => {
      await service.searchPatients({
        searchTerm: 'gomez, ana',
        ownerUserId: 'user-1',
      });

      expect(mockRepository.findCandidates).toHaveBeenCalledTimes(2);
      expect(mockRepository.findCandidates).toHaveBeenCalledWith({
        ownerUserId: 'user-1',
        hasNormalizedName: true,
        normalizedNameContains: 'GOMEZ',
      });
      expect(mockRepository.findCandidates).toHaveBeenCalledWith(
        { ownerUserId: 'user-1', hasNormalizedName: true },
        500,
      );
    });

    it('should find an exact match that is older than the capped pool', async () => {
      const older = buildDocument('doc-old', 'GOMEZ, ANA');
      mockRepository.findCandidates.mockImplementation(async (filter) =>
        filter.normalizedNameContains
          ? [older]
          : [
              buildDocument('doc-9', 'RUIZ, EVA'),
              buildDocument('doc-8', 'PEREZ, LUIS'),
            ],
      );

      const result = await service.searchPatients({ searchTerm: 'gomez, ana' });

      expect(result.totalFound).toBe(1);
      expect(result.documents.map((d) => [d.document.id, d.matchType])).toEqual([
        ['doc-old', MatchType.EXACT],
      ]);
    });

    it('should score a document returned by both fetches once', async () => {
      const result = await service.searchPatients({ searchTerm: 'ruiz, pedro' });

      expect(result.documents.map((d) => d.document.id)).toEqual(['doc-5']);
    });

    it('should validate input before touching the repository', async () => {
      await expect(
        service.searchPatients({ searchTerm: '  !! ' }),
      ).rejects.toThrow(ValidationError);
      await expect(
        service.searchPatients({ searchTerm: 'ana', limit: 0 }),
      ).rejects.toThrow(ValidationError);
      await expect(
        service.searchPatients({ searchTerm: 'ana', limit: 101 }),
      ).rejects.toThrow(ValidationError);
      await expect(
        service.searchPatients({ searchTerm: 'ana', skip: -1 }),
      ).rejects.toThrow(ValidationError);
      await expect(
        service.searchPatients({ searchTerm: 'ana', minSimilarity: 1.5 }),
      ).rejects.toThrow(ValidationError);
      expect(mockRepository.findCandidates).not.toHaveBeenCalled();
    });
  });

  describe('documentsForPatient', () => {
    it('should only return exact and prefix matches', async () => {
      const result = await service.documentsForPatient('GOMEZ, ANA');

      expect(result.minSimilarity).toBe(0.8);
      expect(result.documents.map((d) => d.document.id)).toEqual([
        'doc-2',
        'doc-4',
        'doc-3',
      ]);
    });

    it('should exclude substring matches', async () => {
      const loose = await service.searchPatients({
        searchTerm: 'ANA',
        minSimilarity: 0,
      });
      const strict = await service.documentsForPatient('ANA');

      expect(loose.strategiesUsed).toContain(MatchType.SUBSTRING);
      expect(strict.totalFound).toBe(0);
    });
  });

  describe('suggestPatientNames', () => {
    it('should return distinct names with their document counts', async () => {
      const result = await service.suggestPatientNames('gom');

      expect(result.suggestions).toEqual([
        {
          name: 'GOMEZ, ANA',
          score: 0.8633,
          matchType: MatchType.PREFIX,
          documentCount: 2,
        },
        {
          name: 'GOMEZ, ANA LUISA',
          score: 0.838,
          matchType: MatchType.PREFIX,
          documentCount: 1,
        },
      ]);
    });

    it('should order equal scores by frequency, then name', async () => {
      mockRepository.findCandidates.mockResolvedValue([
        buildDocument('a', 'GOMEZ, ANA'),
        buildDocument('b', 'PEREZ, ANA'),
        buildDocument('c', 'PEREZ, ANA'),
        buildDocument('d', 'LOPEZ, ANA'),
      ]);

      const result = await service.suggestPatientNames('ana');

      expect(result.suggestions.map((s) => s.name)).toEqual([
        'PEREZ, ANA',
        'GOMEZ, ANA',
        'LOPEZ, ANA',
      ]);
    });

    it('should count documents outside the capped pool', async () => {
      mockRepository.findCandidates.mockImplementation(async (filter) =>
        filter.normalizedNameContains
          ? [
              buildDocument('old-1', 'GOMEZ, ANA'),
              buildDocument('old-2', 'GOMEZ, ANA'),
              buildDocument('old-3', 'GOMEZ, ANA'),
            ]
          : [buildDocument('new-1', 'RUIZ, EVA')],
      );

      const result = await service.suggestPatientNames('gomez, ana');

      expect(result.suggestions).toEqual([
        {
          name: 'GOMEZ, ANA',
          score: 1,
          matchType: MatchType.EXACT,
          documentCount: 3,
        },
      ]);
    });

    it('should respect the limit and reject out-of-range limits', async () => {
      const result = await service.suggestPatientNames('gom', undefined, 1);

      expect(result.suggestions).toHaveLength(1);
      await expect(
        service.suggestPatientNames('gom', undefined, 51),
      ).rejects.toThrow(ValidationError);
    });
  });
});
