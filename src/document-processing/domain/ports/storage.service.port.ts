import { StoredBlob } from '../entities/document.entity';

export interface StorageServicePort {
  /**
   * Upload raw document bytes under a unique name derived from `suggestedName`.
   * A rejected put leaves no object behind.
   */
  put(
    bytes: Buffer,
    suggestedName: string,
    contentType: string,
  ): Promise<StoredBlob>;

  /**
   * Delete an object. Resolves false when it did not exist.
   */
  delete(blobName: string): Promise<boolean>;

  healthCheck(): Promise<{ healthy: boolean; containerName: string; error?: string }>;
}
