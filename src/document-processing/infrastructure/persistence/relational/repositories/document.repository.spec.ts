import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { QueryFailedError } from 'typeorm';
import { DocumentRepositoryAdapter } from './document.repository';
import { DocumentEntity } from '../entities/document.entity';
import { Document } from '../../../../domain/entities/document.entity';
import { ProcessingStatus } from '../../../../domain/enums/processing-status.enum';

function buildDocument(id: string): Document {
  return new Document({
    id,
    processingId: `proc-${id}`,
    fileName: `${id}.pdf`,
    contentType: 'application/pdf',
    fileSize: 10,
    status: ProcessingStatus.COMPLETED,
    createdAt: new Date('2024-05-01T08:00:00Z'),
  });
}

const rowRejected = (message: string) =>
  new QueryFailedError('INSERT INTO "documents"', [], new Error(message));

describe('DocumentRepositoryAdapter', () => {
  let adapter: DocumentRepositoryAdapter;
  let queryBuilder: {
    orderBy: jest.Mock;
    addOrderBy: jest.Mock;
    andWhere: jest.Mock;
    take: jest.Mock;
    getMany: jest.Mock;
  };
  let mockRepository: {
    insert: jest.Mock;
    createQueryBuilder: jest.Mock;
  };

  beforeEach(async () => {
    queryBuilder = {
      orderBy: jest.fn().mockReturnThis(),
      addOrderBy: jest.fn().mockReturnThis(),
      andWhere: jest.fn().mockReturnThis(),
      take: jest.fn().mockReturnThis(),
      getMany: jest.fn().mockResolvedValue([]),
    };
    mockRepository = {
      insert: jest.fn(),
      createQueryBuilder: jest.fn(() => queryBuilder),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DocumentRepositoryAdapter,
        {
          provide: getRepositoryToken(DocumentEntity),
          useValue: mockRepository,
        },
      ],
    }).compile();

    adapter = module.get<DocumentRepositoryAdapter>(DocumentRepositoryAdapter);
  });

  describe('insertMany', () => {
    it('should insert every row in one statement', async () => {
      mockRepository.insert.mockResolvedValue({});

      const outcomes = await adapter.insertMany([
        buildDocument('a'),
        buildDocument('b'),
      ]);

      expect(mockRepository.insert).toHaveBeenCalledTimes(1);
      expect(outcomes).toEqual([
        { ok: true, id: 'a' },
        { ok: true, id: 'b' },
      ]);
    });

    it('should retry row by row when the bulk insert is rejected', async () => {
      mockRepository.insert
        .mockRejectedValueOnce(rowRejected('value too long'))
        .mockResolvedValueOnce({})
        .mockRejectedValueOnce(rowRejected('value too long'))
        .mockResolvedValueOnce({});

      const outcomes = await adapter.insertMany([
        buildDocument('a'),
        buildDocument('b'),
        buildDocument('c'),
      ]);

      expect(mockRepository.insert).toHaveBeenCalledTimes(4);
      expect(outcomes).toEqual([
        { ok: true, id: 'a' },
        { ok: false, id: 'b', error: 'value too long' },
        { ok: true, id: 'c' },
      ]);
    });

    it('should reject the whole call when the failure is not row-level', async () => {
      mockRepository.insert.mockRejectedValue(new Error('connection reset'));

      await expect(
        adapter.insertMany([buildDocument('a'), buildDocument('b')]),
      ).rejects.toThrow('connection reset');
      expect(mockRepository.insert).toHaveBeenCalledTimes(1);
    });

    it('should not touch the database for an empty list', async () => {
      await expect(adapter.insertMany([])).resolves.toEqual([]);
      expect(mockRepository.insert).not.toHaveBeenCalled();
    });
  });

  describe('findCandidates', () => {
    it('should escape LIKE wildcards in name filters', async () => {
      await adapter.findCandidates({
        normalizedNamePrefix: 'A_B',
        normalizedNameContains: '50%',
      });

      expect(queryBuilder.andWhere).toHaveBeenCalledWith(
        'document.normalized_patient_name LIKE :prefix',
        { prefix: 'A\\_B%' },
      );
      expect(queryBuilder.andWhere).toHaveBeenCalledWith(
        'document.normalized_patient_name LIKE :contains',
        { contains: '%50\\%%' },
      );
    });

    it('should only limit the query when a cap is given', async () => {
      await adapter.findCandidates({ hasNormalizedName: true });
      expect(queryBuilder.take).not.toHaveBeenCalled();

      await adapter.findCandidates({ hasNormalizedName: true }, 2);
      expect(queryBuilder.take).toHaveBeenCalledWith(2);
    });
  });
});
