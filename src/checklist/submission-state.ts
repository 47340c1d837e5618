import {
  IncompleteSubmissionError,
  SubmissionClosedError,
  UnknownDocumentTypeError,
} from '../common/errors/checklist.errors';
import { FileValidator } from '../common/validators/file.validator';
import type { DocumentRequirement } from '../tracks/track.types';
import {
  ChecklistItem,
  ChecklistItemStatus,
  IncomingFile,
  SubmissionPhase,
  SubmissionState,
  UploadedDocument,
} from './checklist.types';

/*
 * Operaciones puras sobre el borrador de envío.
 * Ninguna modifica el estado recibido: todas devuelven uno nuevo (congelado)
 * o lanzan un ChecklistError dejando el original intacto.
 */

export function createSubmissionState(
  applicantId: string,
  trackId: string,
): SubmissionState {
  return freezeState({ applicantId, trackId, documents: {}, submittedAt: null });
}

export function findRequirement(
  requirements: readonly DocumentRequirement[],
  documentType: string,
): DocumentRequirement | undefined {
  return requirements.find((r) => r.documentType === documentType);
}

/**
 * Archivo adjunto de un tipo de documento.
 * Solo mira propiedades propias: tipos como "constructor" no resuelven al prototipo.
 */
export function getDocument(
  state: SubmissionState,
  documentType: string,
): UploadedDocument | undefined {
  return Object.prototype.hasOwnProperty.call(state.documents, documentType)
    ? state.documents[documentType]
    : undefined;
}

/**
 * Adjunta (o reemplaza) el archivo de un tipo de documento.
 *
 * @throws {SubmissionClosedError} Si el borrador ya fue enviado
 * @throws {UnknownDocumentTypeError} Si el tipo no pertenece a la ruta
 * @throws {ValidationError} Si el archivo no cumple la regla (formato, tamaño, nombre)
 */
export function attachFile(
  state: SubmissionState,
  documentType: string,
  file: IncomingFile,
  requirements: readonly DocumentRequirement[],
): SubmissionState {
  assertOpen(state);

  const requirement = findRequirement(requirements, documentType);
  if (!requirement) {
    throw new UnknownDocumentTypeError(documentType, state.trackId);
  }

  FileValidator.validate(file, requirement);

  const document: UploadedDocument = Object.freeze({
    documentType,
    fileName: file.originalName,
    sizeBytes: file.size,
    contentType: file.mimeType,
    content: file.buffer,
  });

  return freezeState({
    ...state,
    documents: { ...state.documents, [documentType]: document },
  });
}

/** Quita el archivo de un tipo de documento (no-op si no había) */
export function detachFile(
  state: SubmissionState,
  documentType: string,
): SubmissionState {
  assertOpen(state);

  if (!getDocument(state, documentType)) {
    return state;
  }

  const { [documentType]: _removed, ...rest } = state.documents;
  return freezeState({ ...state, documents: rest });
}

/**
 * Cambia la ruta del borrador.
 * Conserva solo los archivos que cumplen la regla del mismo tipo en la nueva ruta.
 */
export function selectTrack(
  state: SubmissionState,
  trackId: string,
  requirements: readonly DocumentRequirement[],
): SubmissionState {
  assertOpen(state);

  if (trackId === state.trackId) {
    return state;
  }

  const kept: [string, UploadedDocument][] = [];
  for (const requirement of requirements) {
    const doc = getDocument(state, requirement.documentType);
    if (doc && FileValidator.satisfies(doc, requirement)) {
      kept.push([requirement.documentType, doc]);
    }
  }

  // fromEntries crea propiedades propias, también para "__proto__"
  return freezeState({ ...state, trackId, documents: Object.fromEntries(kept) });
}

/**
 * true si todos los documentos requeridos están adjuntos y cumplen su regla.
 */
export function isReadyForSubmission(
  state: SubmissionState,
  requirements: readonly DocumentRequirement[],
): boolean {
  return requirements.every((requirement) => {
    if (!requirement.required) return true;
    const doc = getDocument(state, requirement.documentType);
    return (
      doc !== undefined &&
      doc.documentType === requirement.documentType &&
      FileValidator.satisfies(doc, requirement)
    );
  });
}

/** Estado de cada documento de la ruta, en orden de presentación */
export function evaluateChecklist(
  state: SubmissionState,
  requirements: readonly DocumentRequirement[],
): ChecklistItem[] {
  return requirements.map((requirement) => {
    const doc = getDocument(state, requirement.documentType);

    let status: ChecklistItemStatus;
    if (!doc) {
      status = requirement.required
        ? ChecklistItemStatus.MISSING
        : ChecklistItemStatus.OPTIONAL_EMPTY;
    } else if (FileValidator.satisfies(doc, requirement)) {
      status = ChecklistItemStatus.ATTACHED;
    } else {
      status = ChecklistItemStatus.INVALID;
    }

    return {
      documentType: requirement.documentType,
      displayLabel: requirement.displayLabel,
      required: requirement.required,
      status,
      fileName: doc?.fileName ?? null,
      sizeBytes: doc?.sizeBytes ?? null,
    };
  });
}

export function getPhase(
  state: SubmissionState,
  requirements: readonly DocumentRequirement[],
): SubmissionPhase {
  if (state.submittedAt) return SubmissionPhase.SUBMITTED;
  if (isReadyForSubmission(state, requirements)) return SubmissionPhase.READY;
  if (Object.keys(state.documents).length === 0) return SubmissionPhase.EMPTY;
  return SubmissionPhase.PARTIALLY_FILLED;
}

/**
 * Verifica que el borrador se pueda enviar.
 *
 * @throws {SubmissionClosedError} Si ya fue enviado
 * @throws {IncompleteSubmissionError} Con cada documento faltante o inválido
 */
export function assertReadyForSubmission(
  state: SubmissionState,
  requirements: readonly DocumentRequirement[],
): void {
  assertOpen(state);

  if (isReadyForSubmission(state, requirements)) return;

  const issues = evaluateChecklist(state, requirements)
    .filter(
      (item) =>
        item.status === ChecklistItemStatus.MISSING ||
        item.status === ChecklistItemStatus.INVALID,
    )
    .map(({ documentType, status }) => ({ documentType, status }));
  throw new IncompleteSubmissionError(issues);
}

export function markSubmitted(state: SubmissionState, at: Date): SubmissionState {
  assertOpen(state);
  return freezeState({ ...state, submittedAt: at });
}

function assertOpen(state: SubmissionState): void {
  if (state.submittedAt) {
    throw new SubmissionClosedError(state.applicantId);
  }
}

function freezeState(state: SubmissionState): SubmissionState {
  return Object.freeze({ ...state, documents: Object.freeze({ ...state.documents }) });
}
