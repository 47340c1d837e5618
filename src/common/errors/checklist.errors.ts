/**
 * Jerarquía de errores del checklist de documentos.
 *
 * Cada error incluye:
 * - Código legible por máquina (para que el frontend marque el campo afectado)
 * - Status HTTP
 * - Mensaje
 * - Detalles (siempre con documentType cuando el error es de un archivo)
 *
 * ChecklistErrorFilter los convierte a respuestas HTTP.
 */

export enum ChecklistErrorCode {
  // Configuración (422)
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',

  // Validación de archivo (400, 413)
  UNKNOWN_DOCUMENT_TYPE = 'UNKNOWN_DOCUMENT_TYPE',
  INVALID_FILE_NAME = 'INVALID_FILE_NAME',
  EMPTY_FILE = 'EMPTY_FILE',
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',
  FILE_TOO_LARGE = 'FILE_TOO_LARGE',

  // Estado del borrador (404, 409)
  DRAFT_NOT_FOUND = 'DRAFT_NOT_FOUND',
  INCOMPLETE_SUBMISSION = 'INCOMPLETE_SUBMISSION',
  SUBMISSION_CLOSED = 'SUBMISSION_CLOSED',
  SUBMISSION_IN_PROGRESS = 'SUBMISSION_IN_PROGRESS',
}

export type ErrorDetails = Record<string, unknown>;

export class ChecklistError extends Error {
  constructor(
    public readonly code: ChecklistErrorCode,
    public readonly statusCode: number,
    message: string,
    public readonly details?: ErrorDetails,
  ) {
    super(message);
    this.name = 'ChecklistError';

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Formato de respuesta del API
   */
  toResponse() {
    return {
      statusCode: this.statusCode,
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
      },
    };
  }
}

// Configuración

export class ConfigurationError extends ChecklistError {
  constructor(message: string, details?: ErrorDetails) {
    super(ChecklistErrorCode.CONFIGURATION_ERROR, 422, message, details);
    this.name = 'ConfigurationError';
  }
}

export class UnknownTrackError extends ConfigurationError {
  constructor(public readonly trackId: string) {
    super(`Unknown enrollment track: ${trackId}`, { trackId });
    this.name = 'UnknownTrackError';
  }
}

// Validación de archivos (recuperables: el usuario puede volver a subir)

export class ValidationError extends ChecklistError {
  constructor(
    code: ChecklistErrorCode,
    statusCode: number,
    public readonly documentType: string,
    message: string,
    details: ErrorDetails = {},
  ) {
    super(code, statusCode, message, { documentType, ...details });
    this.name = 'ValidationError';
  }
}

export class UnknownDocumentTypeError extends ValidationError {
  constructor(documentType: string, trackId: string) {
    super(
      ChecklistErrorCode.UNKNOWN_DOCUMENT_TYPE,
      400,
      documentType,
      `Document type "${documentType}" is not part of track ${trackId}`,
      { trackId },
    );
    this.name = 'UnknownDocumentTypeError';
  }
}

export class InvalidFileNameError extends ValidationError {
  constructor(documentType: string, reason: string) {
    super(
      ChecklistErrorCode.INVALID_FILE_NAME,
      400,
      documentType,
      `Invalid file name: ${reason}`,
      { reason },
    );
    this.name = 'InvalidFileNameError';
  }
}

export class EmptyFileError extends ValidationError {
  constructor(documentType: string) {
    super(ChecklistErrorCode.EMPTY_FILE, 400, documentType, 'File is empty');
    this.name = 'EmptyFileError';
  }
}

export class UnsupportedFormatError extends ValidationError {
  constructor(
    documentType: string,
    extension: string,
    acceptedFormats: readonly string[],
    reason?: string,
  ) {
    super(
      ChecklistErrorCode.UNSUPPORTED_FORMAT,
      400,
      documentType,
      reason ??
        `Unsupported format "${extension || '(none)'}". Allowed: ${acceptedFormats.join(', ')}`,
      { extension, acceptedFormats: [...acceptedFormats] },
    );
    this.name = 'UnsupportedFormatError';
  }
}

export class FileTooLargeError extends ValidationError {
  constructor(documentType: string, sizeBytes: number, maxSizeBytes: number) {
    super(
      ChecklistErrorCode.FILE_TOO_LARGE,
      413,
      documentType,
      `File too large. Maximum size: ${formatMegabytes(maxSizeBytes)} MB`,
      { sizeBytes, maxSizeBytes },
    );
    this.name = 'FileTooLargeError';
  }
}

// Estado del borrador

export interface ChecklistIssue {
  documentType: string;
  status: string;
}

export class IncompleteSubmissionError extends ChecklistError {
  constructor(public readonly issues: ChecklistIssue[]) {
    super(
      ChecklistErrorCode.INCOMPLETE_SUBMISSION,
      409,
      `Required documents missing or invalid: ${issues.map((i) => i.documentType).join(', ')}`,
      { issues },
    );
    this.name = 'IncompleteSubmissionError';
  }
}

export class SubmissionClosedError extends ChecklistError {
  constructor(applicantId: string) {
    super(
      ChecklistErrorCode.SUBMISSION_CLOSED,
      409,
      'Documents were already submitted for this session',
      { applicantId },
    );
    this.name = 'SubmissionClosedError';
  }
}

export class SubmissionInProgressError extends ChecklistError {
  constructor(applicantId: string) {
    super(
      ChecklistErrorCode.SUBMISSION_IN_PROGRESS,
      409,
      'Documents are being submitted for this session',
      { applicantId },
    );
    this.name = 'SubmissionInProgressError';
  }
}

export class DraftNotFoundError extends ChecklistError {
  constructor(applicantId: string) {
    super(
      ChecklistErrorCode.DRAFT_NOT_FOUND,
      404,
      'No document draft open. Select an enrollment track first',
      { applicantId },
    );
    this.name = 'DraftNotFoundError';
  }
}

function formatMegabytes(bytes: number): string {
  const mb = bytes / 1024 / 1024;
  return Number.isInteger(mb) ? String(mb) : mb.toFixed(1);
}
