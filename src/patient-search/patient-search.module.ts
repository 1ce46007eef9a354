import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import patientSearchConfig from './config/patient-search.config';
import { PatientSearchController } from './patient-search.controller';
import { PatientSearchService } from './patient-search.service';
import { PatientSearchDomainService } from './domain/services/patient-search.domain.service';
import { DocumentProcessingModule } from '../document-processing/document-processing.module';
import { AuditModule } from '../audit/audit.module';

@Module({
  imports: [
    ConfigModule.forFeature(patientSearchConfig),
    // Provides 'DocumentRepositoryPort'
    DocumentProcessingModule,
    AuditModule,
  ],
  controllers: [PatientSearchController],
  providers: [PatientSearchService, PatientSearchDomainService],
})
export class PatientSearchModule {}
