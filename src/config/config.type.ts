import { AppConfig } from './app-config.type';
import { ThrottlerConfig } from './throttler-config.type';
import { DatabaseConfig } from '../database/config/database-config.type';
import { DocumentProcessingConfig } from '../document-processing/config/document-processing-config.type';
import { PatientSearchConfig } from '../patient-search/config/patient-search-config.type';

export type AllConfigType = {
  app: AppConfig;
  database: DatabaseConfig;
  throttler: ThrottlerConfig;
  documentProcessing: DocumentProcessingConfig;
  patientSearch: PatientSearchConfig;
};
