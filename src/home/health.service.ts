import { Inject, Injectable } from '@nestjs/common';
import { StorageServicePort } from '../document-processing/domain/ports/storage.service.port';

/**
 * Health Check Service
 *
 * Used by monitoring systems and load balancers to verify service health.
 */
@Injectable()
export class HealthService {
  constructor(
    @Inject('StorageServicePort')
    private readonly storageService: StorageServicePort,
  ) {}

  async checkStorageHealth(): Promise<{
    status: 'healthy' | 'unhealthy';
    bucket: string;
    error?: string;
  }> {
    const result = await this.storageService.healthCheck();

    return {
      status: result.healthy ? 'healthy' : 'unhealthy',
      bucket: result.containerName,
      ...(result.error ? { error: result.error } : {}),
    };
  }
}
