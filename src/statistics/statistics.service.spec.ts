import { Test, TestingModule } from '@nestjs/testing';
import { StatisticsService } from './statistics.service';
import {
  DocumentOverview,
  DocumentRepositoryPort,
} from '../document-processing/domain/ports/document.repository.port';
import { ValidationError } from '../utils/errors/domain.error';

const OVERVIEW: DocumentOverview = {
  totalDocuments: 2,
  uniqueOwners: 1,
  completedDocuments: 1,
  failedDocuments: 1,
  validMedicalInfo: 2,
  totalSizeBytes: 3145728,
  averageSizeBytes: 1572864,
  maxSizeBytes: 2621440,
  categories: { LAB: 1, EMER: 1 },
};

describe('StatisticsService', () => {
  let service: StatisticsService;
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
    mockRepository.getOverview.mockResolvedValue(OVERVIEW);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        StatisticsService,
        { provide: 'DocumentRepositoryPort', useValue: mockRepository },
      ],
    }).compile();

    service = module.get<StatisticsService>(StatisticsService);
  });

  it('should report totals and storage in bytes and megabytes', async () => {
    const stats = await service.getOverview();

    expect(stats.totals).toEqual({
      documents: 2,
      uniqueUsers: 1,
      completed: 1,
      failed: 1,
      validMedicalInfo: 2,
    });
    expect(stats.storage).toEqual({
      totalSizeBytes: 3145728,
      averageSizeBytes: 1572864,
      maxSizeBytes: 2621440,
      totalSizeMb: 3,
      averageSizeMb: 1.5,
      maxSizeMb: 2.5,
    });
    expect(stats.categories).toEqual({ LAB: 1, EMER: 1 });
    expect(stats.period).toEqual({
      startDate: null,
      endDate: null,
      filtered: false,
    });
  });

  it('should pass the period to the repository and echo it', async () => {
    const startDate = new Date('2024-01-01T00:00:00.000Z');
    const endDate = new Date('2024-02-01T00:00:00.000Z');

    const stats = await service.getOverview({ startDate, endDate });

    expect(mockRepository.getOverview).toHaveBeenCalledWith({
      startDate,
      endDate,
    });
    expect(stats.period).toEqual({
      startDate: '2024-01-01T00:00:00.000Z',
      endDate: '2024-02-01T00:00:00.000Z',
      filtered: true,
    });
  });

  it('should reject a period that ends before it starts', async () => {
    await expect(
      service.getOverview({
        startDate: new Date('2024-02-01T00:00:00Z'),
        endDate: new Date('2024-01-01T00:00:00Z'),
      }),
    ).rejects.toThrow(ValidationError);
    expect(mockRepository.getOverview).not.toHaveBeenCalled();
  });
});
