import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DocumentProcessorServiceClient } from '@google-cloud/documentai';
import { OcrServicePort, OcrResult } from '../../domain/ports/ocr.service.port';
import { StoredBlob } from '../../domain/entities/document.entity';
import { AllConfigType } from '../../../config/config.type';
import { errorMessageOf } from '../../../utils/errors/domain.error';

/**
 * GCP Document AI Adapter
 *
 * Runs online (synchronous) processing against a blob already uploaded to
 * Cloud Storage. Reads the document by its gs:// URI, so bytes are never
 * sent twice.
 *
 * IAM Requirements:
 * - Service account needs: roles/documentai.apiUser
 * - Read access to the raw upload bucket
 *
 * Never log extracted text.
 */
@Injectable()
export class GcpDocumentAiAdapter implements OcrServicePort {
  private readonly logger = new Logger(GcpDocumentAiAdapter.name);
  private readonly client: DocumentProcessorServiceClient;
  private readonly processorName: string;

  constructor(private readonly configService: ConfigService<AllConfigType>) {
    const projectId = this.configService.getOrThrow(
      'documentProcessing.gcp.projectId',
      { infer: true },
    );
    const location = this.configService.getOrThrow(
      'documentProcessing.gcp.documentAi.location',
      { infer: true },
    );
    const processorId = this.configService.getOrThrow(
      'documentProcessing.gcp.documentAi.processorId',
      { infer: true },
    );

    this.client = new DocumentProcessorServiceClient({
      apiEndpoint: `${location}-documentai.googleapis.com`,
    });
    this.processorName = `projects/${projectId}/locations/${location}/processors/${processorId}`;

    this.logger.log(
      `GCP Document AI adapter initialized (location: ${location})`,
    );
  }

  async extractText(blob: StoredBlob, contentType: string): Promise<OcrResult> {
    const startedAt = Date.now();

    try {
      const [result] = await this.client.processDocument({
        name: this.processorName,
        gcsDocument: {
          gcsUri: blob.blobUrl,
          mimeType: contentType,
        },
      });

      if (!result.document) {
        throw new Error('No document returned from Document AI');
      }

      const text = result.document.text ?? '';
      const pageCount = result.document.pages?.length ?? 0;
      const processingTimeSeconds = (Date.now() - startedAt) / 1000;

      if (text.trim().length === 0) {
        this.logger.warn(
          '[GCP DOCUMENT AI] No text extracted. Document may be image-only or unsupported',
        );
      } else {
        this.logger.log(
          `[GCP DOCUMENT AI] Extracted ${text.length} characters from ${pageCount} pages in ${processingTimeSeconds.toFixed(2)}s`,
        );
      }

      return { text, pageCount, processingTimeSeconds };
    } catch (error) {
      const errorMessage = this.sanitizeError(error);
      this.logger.error(`[GCP DOCUMENT AI] Processing failed: ${errorMessage}`);

      if (errorMessage.includes('NOT_FOUND')) {
        throw new Error(
          'GCP Document AI processor not found. Please verify processor ID and project configuration.',
        );
      }
      if (errorMessage.includes('PERMISSION_DENIED')) {
        throw new Error(
          'Permission denied calling Document AI. Check the service account roles.',
        );
      }
      throw new Error(`Document AI processing failed: ${errorMessage}`);
    }
  }

  private sanitizeError(error: unknown): string {
    return errorMessageOf(error)
      .replace(/gs:\/\/[^\s]+/g, '[GCS_URI_REDACTED]')
      .replace(/projects\/[^/\s]+/g, 'projects/[PROJECT_REDACTED]')
      .substring(0, 200);
  }
}
