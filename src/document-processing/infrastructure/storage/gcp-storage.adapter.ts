import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Storage, Bucket } from '@google-cloud/storage';
import { randomUUID } from 'crypto';
import * as path from 'path';
import { StorageServicePort } from '../../domain/ports/storage.service.port';
import { StoredBlob } from '../../domain/entities/document.entity';
import { AllConfigType } from '../../../config/config.type';
import { errorMessageOf } from '../../../utils/errors/domain.error';

function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 404
  );
}

/**
 * GCP Cloud Storage Adapter
 *
 * Raw uploads land under `<rawPrefix><hex uuid>_<file name>` so two files
 * with the same name never collide.
 *
 * IAM Requirements:
 * - Service account needs: roles/storage.objectAdmin on the bucket
 *
 * Security:
 * - Object names carry patient names. Never log them at INFO level.
 */
@Injectable()
export class GcpStorageAdapter implements StorageServicePort {
  private readonly logger = new Logger(GcpStorageAdapter.name);
  private readonly storage: Storage;
  private readonly bucket: Bucket;
  private readonly rawPrefix: string;

  constructor(private readonly configService: ConfigService<AllConfigType>) {
    // Priority: explicit key file, then Application Default Credentials
    const credentialsPathEnv = process.env.GOOGLE_APPLICATION_CREDENTIALS;
    if (credentialsPathEnv) {
      const keyFilename = path.isAbsolute(credentialsPathEnv)
        ? credentialsPathEnv
        : path.resolve(process.cwd(), credentialsPathEnv);
      this.storage = new Storage({ keyFilename });
      this.logger.log('GCP Storage initialized with service account key');
    } else {
      this.storage = new Storage();
      this.logger.log('GCP Storage initialized with ADC');
    }

    this.bucket = this.storage.bucket(
      this.configService.getOrThrow('documentProcessing.gcp.storage.bucket', {
        infer: true,
      }),
    );
    this.rawPrefix = this.configService.getOrThrow(
      'documentProcessing.gcp.storage.rawPrefix',
      { infer: true },
    );
  }

  async put(
    bytes: Buffer,
    suggestedName: string,
    contentType: string,
  ): Promise<StoredBlob> {
    const blobName = `${this.rawPrefix}${randomUUID().replace(/-/g, '')}_${suggestedName}`;
    const file = this.bucket.file(blobName);

    try {
      await file.save(bytes, {
        contentType,
        resumable: false,
      });
    } catch (error) {
      this.logger.error(
        `[GCP STORAGE] Upload failed: ${this.sanitizeError(error)}`,
      );
      await this.removePartial(blobName);
      throw error;
    }

    this.logger.debug(`[GCP STORAGE] Stored ${bytes.length} bytes`);

    return {
      blobName,
      blobUrl: `gs://${this.bucket.name}/${blobName}`,
      containerName: this.bucket.name,
    };
  }

  async delete(blobName: string): Promise<boolean> {
    try {
      await this.bucket.file(blobName).delete();
      return true;
    } catch (error) {
      // Idempotent: a missing object is not a failure
      if (isNotFound(error)) {
        this.logger.debug('[GCP STORAGE] Object already absent on delete');
        return false;
      }
      this.logger.error(
        `[GCP STORAGE] Delete failed: ${this.sanitizeError(error)}`,
      );
      throw error;
    }
  }

  async healthCheck(): Promise<{
    healthy: boolean;
    containerName: string;
    error?: string;
  }> {
    try {
      const [exists] = await this.bucket.exists();
      return exists
        ? { healthy: true, containerName: this.bucket.name }
        : {
            healthy: false,
            containerName: this.bucket.name,
            error: 'Bucket does not exist',
          };
    } catch (error) {
      return {
        healthy: false,
        containerName: this.bucket.name,
        error: this.sanitizeError(error),
      };
    }
  }

  private async removePartial(blobName: string): Promise<void> {
    try {
      await this.bucket.file(blobName).delete({ ignoreNotFound: true });
    } catch (cleanupError) {
      this.logger.warn(
        `[GCP STORAGE] Could not remove partial upload: ${this.sanitizeError(cleanupError)}`,
      );
    }
  }

  private sanitizeError(error: unknown): string {
    return errorMessageOf(error)
      .replace(/gs:\/\/[^\s]+/g, '[GCS_URI_REDACTED]')
      .replace(/projects\/[^/\s]+/g, 'projects/[PROJECT_REDACTED]')
      .substring(0, 200);
  }
}
