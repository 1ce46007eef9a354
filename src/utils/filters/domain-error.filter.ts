import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import { DomainError, DomainErrorKind } from '../errors/domain.error';
import { sanitizeErrorMessage } from '../../audit/utils/phi-sanitizer.util';

const STATUS_BY_KIND: Record<DomainErrorKind, number> = {
  [DomainErrorKind.VALIDATION]: HttpStatus.BAD_REQUEST,
  [DomainErrorKind.PARSE]: HttpStatus.UNPROCESSABLE_ENTITY,
  [DomainErrorKind.STORAGE]: HttpStatus.BAD_GATEWAY,
  [DomainErrorKind.OCR]: HttpStatus.BAD_GATEWAY,
  [DomainErrorKind.PERSISTENCE]: HttpStatus.SERVICE_UNAVAILABLE,
  // Denied answers with the not-found body
  [DomainErrorKind.NOT_FOUND]: HttpStatus.NOT_FOUND,
  [DomainErrorKind.DENIED]: HttpStatus.NOT_FOUND,
  [DomainErrorKind.CANCELLED]: HttpStatus.REQUEST_TIMEOUT,
};

/**
 * Maps DomainError kinds to HTTP responses.
 *
 * This is the only place where core error kinds meet transport codes.
 */
@Catch(DomainError)
export class DomainErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(DomainErrorFilter.name);

  catch(error: DomainError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    const status = DomainErrorFilter.statusFor(error.kind);

    if (status >= 500) {
      this.logger.error(
        `[${error.kind.toUpperCase()}] ${sanitizeErrorMessage(error.message)}`,
      );
    }

    const body =
      error.kind === DomainErrorKind.DENIED
        ? {
            status,
            error: DomainErrorKind.NOT_FOUND,
            message: 'Document not found',
            timestamp: error.timestamp,
          }
        : { status, ...error.toJSON() };

    response.status(status).json(body);
  }

  static statusFor(kind: DomainErrorKind): number {
    return STATUS_BY_KIND[kind];
  }
}
