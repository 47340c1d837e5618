/**
 * Archivo recibido desde el formulario, antes de validarlo.
 * El controller lo arma a partir de Express.Multer.File.
 */
export interface IncomingFile {
  originalName: string;
  mimeType: string;
  size: number;
  buffer: Buffer;
}

/** Archivo ya validado y asociado a un tipo de documento */
export interface UploadedDocument {
  readonly documentType: string;
  readonly fileName: string;
  readonly sizeBytes: number;
  readonly contentType: string;
  readonly content: Buffer;
}

/**
 * Borrador de envío de un postulante.
 * Es un value object: las operaciones del checklist devuelven uno nuevo.
 */
export interface SubmissionState {
  readonly applicantId: string;
  readonly trackId: string;
  readonly documents: Readonly<Record<string, UploadedDocument>>;
  readonly submittedAt: Date | null;
}

export enum SubmissionPhase {
  EMPTY = 'EMPTY',
  PARTIALLY_FILLED = 'PARTIALLY_FILLED',
  READY = 'READY',
  SUBMITTED = 'SUBMITTED',
}

export enum ChecklistItemStatus {
  /** Requerido y sin archivo */
  MISSING = 'MISSING',
  /** Con archivo que cumple la regla */
  ATTACHED = 'ATTACHED',
  /** Con archivo que ya no cumple la regla (formato o tamaño) */
  INVALID = 'INVALID',
  /** Opcional y sin archivo */
  OPTIONAL_EMPTY = 'OPTIONAL_EMPTY',
}

export interface ChecklistItem {
  documentType: string;
  displayLabel: string;
  required: boolean;
  status: ChecklistItemStatus;
  fileName: string | null;
  sizeBytes: number | null;
}
