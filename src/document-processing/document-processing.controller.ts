import {
  Controller,
  Post,
  Get,
  Delete,
  Param,
  Body,
  Query,
  Res,
  UseInterceptors,
  UploadedFile,
  UploadedFiles,
  BadRequestException,
  ParseUUIDPipe,
  HttpCode,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { FileInterceptor, FilesInterceptor } from '@nestjs/platform-express';
import { Throttle } from '@nestjs/throttler';
import {
  ApiTags,
  ApiOperation,
  ApiOkResponse,
  ApiCreatedResponse,
  ApiConsumes,
  ApiBody,
  ApiParam,
  ApiNotFoundResponse,
  ApiBadRequestResponse,
  ApiBadGatewayResponse,
  ApiServiceUnavailableResponse,
} from '@nestjs/swagger';
import { Response } from 'express';
import { DocumentProcessingService } from './document-processing.service';
import { UploadDocumentDto } from './dto/upload-document.dto';
import { DocumentResponseDto } from './dto/document-response.dto';
import { BatchUploadResponseDto } from './dto/batch-upload-response.dto';
import {
  DocumentListQueryDto,
  DocumentOwnerQueryDto,
} from './dto/document-list-query.dto';
import { DocumentListResponseDto } from './dto/document-list-response.dto';
import { DocumentDeleteResponseDto } from './dto/document-delete-response.dto';
import { IncomingFile } from './domain/services/ingestion-pipeline.domain.service';

// Hard transport ceiling; the configured per-file limit is enforced by the pipeline
const MULTER_MAX_FILE_SIZE = 50 * 1024 * 1024;
const MULTER_MAX_BATCH_FILES = 100;

const UPLOAD_FIELDS = {
  description: { type: 'string', maxLength: 500 },
  tags: { type: 'string', description: 'Comma-separated tags' },
  userId: { type: 'string' },
};

/**
 * Multer reads multipart file names as latin1; clients send UTF-8. Names
 * that are not a latin1 rendering of valid UTF-8 are kept as received.
 */
function decodeMultipartFileName(name: string): string {
  if (/[^\u0000-\u00ff]/.test(name)) {
    return name;
  }
  const decoded = Buffer.from(name, 'latin1').toString('utf8');
  return decoded.includes('\ufffd') ? name : decoded;
}

function toIncomingFile(file: Express.Multer.File): IncomingFile {
  return {
    buffer: file.buffer,
    originalName: decodeMultipartFileName(file.originalname),
    contentType: file.mimetype,
  };
}

/**
 * Aborts when the client goes away before the response is written, so an
 * interrupted upload leaves nothing behind.
 */
function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

/**
 * Document Processing Controller
 *
 * Security:
 * - Rate limiting on uploads
 * - Documents outside the caller's userId filter are reported as not found
 * - No storage locations exposed
 */
@ApiTags('Documents')
@Controller({ path: 'documents', version: '1' })
export class DocumentProcessingController {
  private readonly logger = new Logger(DocumentProcessingController.name);

  constructor(
    private readonly documentProcessingService: DocumentProcessingService,
  ) {}

  @Post('upload')
  @HttpCode(HttpStatus.CREATED)
  @Throttle({ default: { limit: 10, ttl: 60000 } }) // 10 uploads per minute
  @ApiOperation({ summary: 'Upload one medical document for OCR processing' })
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      properties: {
        file: {
          type: 'string',
          format: 'binary',
          description:
            'Document file named EXPEDIENTE_NOMBRE_EPISODIO_CATEGORIA.ext',
        },
        ...UPLOAD_FIELDS,
      },
      required: ['file'],
    },
  })
  @ApiCreatedResponse({ type: DocumentResponseDto })
  @ApiBadRequestResponse({ description: 'Missing, empty or oversized file' })
  @ApiBadGatewayResponse({ description: 'Storage upload failed' })
  @ApiServiceUnavailableResponse({ description: 'Document could not be saved' })
  @UseInterceptors(
    FileInterceptor('file', {
      limits: { fileSize: MULTER_MAX_FILE_SIZE, files: 1 },
    }),
  )
  async uploadDocument(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() dto: UploadDocumentDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<DocumentResponseDto> {
    if (!file) {
      throw new BadRequestException('File is required');
    }

    this.logger.log(`[UPLOAD] Single upload received: ${file.size} bytes`);

    return this.documentProcessingService.uploadDocument(toIncomingFile(file), {
      ownerUserId: dto.userId,
      description: dto.description,
      tags: dto.tags,
      signal: abortOnDisconnect(res),
    });
  }

  @Post('upload/batch')
  @HttpCode(HttpStatus.CREATED)
  @Throttle({ default: { limit: 5, ttl: 60000 } })
  @ApiOperation({
    summary: 'Upload several medical documents',
    description:
      'Files are processed concurrently. Per-file failures are reported in the response; the call itself only fails on invalid input or when the batch cannot be saved.',
  })
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      properties: {
        files: {
          type: 'array',
          items: { type: 'string', format: 'binary' },
        },
        ...UPLOAD_FIELDS,
      },
      required: ['files'],
    },
  })
  @ApiCreatedResponse({ type: BatchUploadResponseDto })
  @ApiBadRequestResponse({ description: 'No files or too many files' })
  @ApiServiceUnavailableResponse({ description: 'Batch could not be saved' })
  @UseInterceptors(
    FilesInterceptor('files', MULTER_MAX_BATCH_FILES, {
      limits: { fileSize: MULTER_MAX_FILE_SIZE },
    }),
  )
  async uploadBatch(
    @UploadedFiles() files: Express.Multer.File[] | undefined,
    @Body() dto: UploadDocumentDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<BatchUploadResponseDto> {
    const incoming = (files ?? []).map(toIncomingFile);

    this.logger.log(`[UPLOAD] Batch upload received: ${incoming.length} files`);

    return this.documentProcessingService.uploadBatch(incoming, {
      ownerUserId: dto.userId,
      description: dto.description,
      tags: dto.tags,
      signal: abortOnDisconnect(res),
    });
  }

  @Get()
  @ApiOperation({ summary: 'List documents, newest first' })
  @ApiOkResponse({ type: DocumentListResponseDto })
  async listDocuments(
    @Query() query: DocumentListQueryDto,
  ): Promise<DocumentListResponseDto> {
    return this.documentProcessingService.listDocuments(query);
  }

  @Get(':documentId')
  @ApiOperation({
    summary: 'Get Document Details',
    description: 'Metadata, processing status and OCR text of one document.',
  })
  @ApiParam({ name: 'documentId', type: String, format: 'uuid' })
  @ApiOkResponse({ type: DocumentResponseDto })
  @ApiNotFoundResponse({ description: 'Document not found or access denied' })
  async getDocument(
    @Param('documentId', ParseUUIDPipe) documentId: string,
    @Query() query: DocumentOwnerQueryDto,
  ): Promise<DocumentResponseDto> {
    return this.documentProcessingService.getDocument(documentId, query.userId);
  }

  @Delete(':documentId')
  @ApiOperation({ summary: 'Delete a document and its stored file' })
  @ApiParam({ name: 'documentId', type: String, format: 'uuid' })
  @ApiOkResponse({ type: DocumentDeleteResponseDto })
  @ApiNotFoundResponse({ description: 'Document not found or access denied' })
  async deleteDocument(
    @Param('documentId', ParseUUIDPipe) documentId: string,
    @Query() query: DocumentOwnerQueryDto,
  ): Promise<DocumentDeleteResponseDto> {
    return this.documentProcessingService.deleteDocument(
      documentId,
      query.userId,
    );
  }
}
