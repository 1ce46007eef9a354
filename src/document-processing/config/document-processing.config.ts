import { registerAs } from '@nestjs/config';
import { IsString, IsInt, Min, Max, validateSync } from 'class-validator';
import { plainToClass } from 'class-transformer';
import { DocumentProcessingConfig } from './document-processing-config.type';

class EnvironmentVariablesValidator {
  @IsString()
  DOC_PROCESSING_GCP_PROJECT_ID!: string;

  @IsString()
  DOC_PROCESSING_GCP_LOCATION: string = 'us';

  @IsString()
  DOC_PROCESSING_PROCESSOR_ID!: string;

  @IsString()
  DOC_PROCESSING_STORAGE_BUCKET!: string;

  @IsString()
  DOC_PROCESSING_RAW_PREFIX: string = 'raw/';

  @IsInt()
  @Min(1)
  @Max(100)
  DOC_PROCESSING_MAX_FILE_SIZE_MB: number = 10;

  @IsInt()
  @Min(1)
  @Max(100)
  DOC_PROCESSING_MAX_FILES_PER_BATCH: number = 10;

  @IsInt()
  @Min(1)
  @Max(32)
  DOC_PROCESSING_BATCH_MAX_WORKERS: number = 4;
}

export default registerAs<DocumentProcessingConfig>(
  'documentProcessing',
  () => {
    const validatedConfig = plainToClass(
      EnvironmentVariablesValidator,
      {
        DOC_PROCESSING_GCP_PROJECT_ID:
          process.env.DOC_PROCESSING_GCP_PROJECT_ID,
        DOC_PROCESSING_GCP_LOCATION:
          process.env.DOC_PROCESSING_GCP_LOCATION || 'us',
        DOC_PROCESSING_PROCESSOR_ID: process.env.DOC_PROCESSING_PROCESSOR_ID,
        DOC_PROCESSING_STORAGE_BUCKET:
          process.env.DOC_PROCESSING_STORAGE_BUCKET,
        DOC_PROCESSING_RAW_PREFIX:
          process.env.DOC_PROCESSING_RAW_PREFIX || 'raw/',
        DOC_PROCESSING_MAX_FILE_SIZE_MB: process.env
          .DOC_PROCESSING_MAX_FILE_SIZE_MB
          ? parseInt(process.env.DOC_PROCESSING_MAX_FILE_SIZE_MB, 10)
          : 10,
        DOC_PROCESSING_MAX_FILES_PER_BATCH: process.env
          .DOC_PROCESSING_MAX_FILES_PER_BATCH
          ? parseInt(process.env.DOC_PROCESSING_MAX_FILES_PER_BATCH, 10)
          : 10,
        DOC_PROCESSING_BATCH_MAX_WORKERS: process.env
          .DOC_PROCESSING_BATCH_MAX_WORKERS
          ? parseInt(process.env.DOC_PROCESSING_BATCH_MAX_WORKERS, 10)
          : 4,
      },
      { enableImplicitConversion: true },
    );

    const errors = validateSync(validatedConfig, {
      skipMissingProperties: false,
    });

    if (errors.length > 0) {
      throw new Error(
        `Document Processing config validation error: ${errors.toString()}`,
      );
    }

    return {
      maxFileSizeMb: validatedConfig.DOC_PROCESSING_MAX_FILE_SIZE_MB,
      maxFilesPerBatch: validatedConfig.DOC_PROCESSING_MAX_FILES_PER_BATCH,
      batchMaxWorkers: validatedConfig.DOC_PROCESSING_BATCH_MAX_WORKERS,
      gcp: {
        projectId: validatedConfig.DOC_PROCESSING_GCP_PROJECT_ID,
        documentAi: {
          location: validatedConfig.DOC_PROCESSING_GCP_LOCATION,
          processorId: validatedConfig.DOC_PROCESSING_PROCESSOR_ID,
        },
        storage: {
          bucket: validatedConfig.DOC_PROCESSING_STORAGE_BUCKET,
          rawPrefix: validatedConfig.DOC_PROCESSING_RAW_PREFIX,
        },
      },
    };
  },
);
