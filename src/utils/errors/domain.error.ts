/**
 * DomainError - closed set of tagged failures raised by the core services.
 *
 * Core code never throws HTTP exceptions; the kind is mapped to a transport
 * status only in DomainErrorFilter.
 */
export enum DomainErrorKind {
  VALIDATION = 'validation',
  PARSE = 'parse',
  STORAGE = 'storage',
  OCR = 'ocr',
  PERSISTENCE = 'persistence',
  NOT_FOUND = 'not_found',
  DENIED = 'denied',
  CANCELLED = 'cancelled',
}

export class DomainError extends Error {
  readonly kind: DomainErrorKind;

  /**
   * Optional hint for the caller on how to fix the request
   */
  readonly suggestion?: string;

  readonly timestamp: string;

  constructor(params: {
    kind: DomainErrorKind;
    message: string;
    suggestion?: string;
    cause?: unknown;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'DomainError';
    this.kind = params.kind;
    this.suggestion = params.suggestion;
    this.timestamp = new Date().toISOString();

    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.kind,
      message: this.message,
      ...(this.suggestion ? { suggestion: this.suggestion } : {}),
      timestamp: this.timestamp,
    };
  }

  static isDomainError(error: unknown): error is DomainError {
    return error instanceof DomainError;
  }
}

export class ValidationError extends DomainError {
  constructor(message: string, suggestion?: string) {
    super({ kind: DomainErrorKind.VALIDATION, message, suggestion });
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends DomainError {
  constructor(message: string) {
    super({ kind: DomainErrorKind.NOT_FOUND, message });
    this.name = 'NotFoundError';
  }
}

export class DeniedError extends DomainError {
  constructor(message: string) {
    super({ kind: DomainErrorKind.DENIED, message });
    this.name = 'DeniedError';
  }
}

/**
 * Raised by the ingestion pipeline for storage, persistence and cancellation
 * failures of a single file.
 */
export class IngestionError extends DomainError {
  readonly fileName: string;

  constructor(params: {
    kind:
      | DomainErrorKind.STORAGE
      | DomainErrorKind.OCR
      | DomainErrorKind.PERSISTENCE
      | DomainErrorKind.CANCELLED;
    message: string;
    fileName: string;
    suggestion?: string;
    cause?: unknown;
  }) {
    super(params);
    this.name = 'IngestionError';
    this.fileName = params.fileName;
  }
}

/**
 * Extract a message from an unknown thrown value
 */
export function errorMessageOf(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
