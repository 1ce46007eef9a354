import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule } from '@nestjs/config';
import documentProcessingConfig from './config/document-processing.config';
import { DocumentProcessingController } from './document-processing.controller';
import { DocumentProcessingService } from './document-processing.service';
import { IngestionPipelineDomainService } from './domain/services/ingestion-pipeline.domain.service';
import { DocumentCatalogDomainService } from './domain/services/document-catalog.domain.service';
import { DocumentEntity } from './infrastructure/persistence/relational/entities/document.entity';
import { DocumentRepositoryAdapter } from './infrastructure/persistence/relational/repositories/document.repository';
import { GcpStorageAdapter } from './infrastructure/storage/gcp-storage.adapter';
import { GcpDocumentAiAdapter } from './infrastructure/ocr/gcp-document-ai.adapter';
import { AuditModule } from '../audit/audit.module';

@Module({
  imports: [
    // Configuration
    ConfigModule.forFeature(documentProcessingConfig),

    // Database
    TypeOrmModule.forFeature([DocumentEntity]),

    // Audit logging
    AuditModule,
  ],
  controllers: [DocumentProcessingController],
  providers: [
    // Application layer
    DocumentProcessingService,

    // Domain layer
    IngestionPipelineDomainService,
    DocumentCatalogDomainService,

    // Infrastructure adapters (Hexagonal Architecture)
    {
      provide: 'DocumentRepositoryPort',
      useClass: DocumentRepositoryAdapter,
    },
    {
      provide: 'StorageServicePort',
      useClass: GcpStorageAdapter,
    },
    {
      provide: 'OcrServicePort',
      useClass: GcpDocumentAiAdapter,
    },
  ],
  exports: [
    DocumentProcessingService,
    'DocumentRepositoryPort',
    'StorageServicePort',
  ],
})
export class DocumentProcessingModule {}
