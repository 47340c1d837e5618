import type { IncomingFile } from '../../checklist/checklist.types';
import type { DocumentRequirement } from '../../tracks/track.types';
import {
  EmptyFileError,
  FileTooLargeError,
  InvalidFileNameError,
  UnsupportedFormatError,
} from '../errors/checklist.errors';

// Magic numbers para validar el contenido real según la extensión
const FILE_SIGNATURES: Record<string, Buffer[]> = {
  jpg: [Buffer.from([0xff, 0xd8, 0xff])],
  jpeg: [Buffer.from([0xff, 0xd8, 0xff])],
  png: [Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])],
  pdf: [Buffer.from([0x25, 0x50, 0x44, 0x46])], // %PDF
  gif: [Buffer.from([0x47, 0x49, 0x46, 0x38])], // GIF8
};

const MAX_FILENAME_LENGTH = 255;

export class FileValidator {
  /**
   * Valida un archivo contra la regla de su tipo de documento.
   * Lanza el ValidationError correspondiente al primer problema encontrado.
   */
  static validate(file: IncomingFile, requirement: DocumentRequirement): void {
    const { documentType, acceptedFormats, maxSizeBytes } = requirement;

    // 1. Extensión: un formato no aceptado siempre es UNSUPPORTED_FORMAT
    const extension = this.getExtension(file.originalName);
    if (!acceptedFormats.includes(extension)) {
      throw new UnsupportedFormatError(documentType, extension, acceptedFormats);
    }

    // 2. Tamaño
    if (file.size > maxSizeBytes) {
      throw new FileTooLargeError(documentType, file.size, maxSizeBytes);
    }

    // 3. Nombre de archivo
    this.validateFilename(file.originalName, documentType);

    // 4. Archivo vacío
    if (file.size <= 0 || file.buffer.length === 0) {
      throw new EmptyFileError(documentType);
    }

    // 5. Contenido real (magic numbers)
    if (!this.validateMagicNumbers(file.buffer, extension)) {
      throw new UnsupportedFormatError(
        documentType,
        extension,
        acceptedFormats,
        `File content does not match the .${extension} format`,
      );
    }
  }

  /**
   * true si el documento ya adjunto sigue cumpliendo formato y tamaño.
   * No relee el contenido: eso se verificó al adjuntarlo.
   */
  static satisfies(
    doc: { fileName: string; sizeBytes: number },
    requirement: DocumentRequirement,
  ): boolean {
    return (
      doc.sizeBytes <= requirement.maxSizeBytes &&
      requirement.acceptedFormats.includes(this.getExtension(doc.fileName))
    );
  }

  /**
   * Valida el nombre de archivo (previene path traversal)
   */
  private static validateFilename(filename: string, documentType: string): void {
    if (filename.trim().length === 0) {
      throw new InvalidFileNameError(documentType, 'file name cannot be empty');
    }

    // eslint-disable-next-line no-control-regex
    if (/[<>:"|?*\x00-\x1F]/.test(filename)) {
      throw new InvalidFileNameError(documentType, 'file name contains invalid characters');
    }

    if (filename.includes('..') || filename.includes('/') || filename.includes('\\')) {
      throw new InvalidFileNameError(documentType, 'file name cannot contain path separators');
    }

    if (filename.length > MAX_FILENAME_LENGTH) {
      throw new InvalidFileNameError(
        documentType,
        `file name too long (max ${MAX_FILENAME_LENGTH} characters)`,
      );
    }
  }

  private static validateMagicNumbers(buffer: Buffer, extension: string): boolean {
    const signatures = FILE_SIGNATURES[extension];

    // Sin firma conocida para este formato: se acepta
    if (!signatures) {
      return true;
    }

    return signatures.some((signature) =>
      buffer.subarray(0, signature.length).equals(signature),
    );
  }

  /**
   * Extensión en minúscula y sin punto ('' si no tiene)
   */
  static getExtension(filename: string): string {
    const parts = filename.split('.');
    return parts.length > 1 ? parts[parts.length - 1].toLowerCase() : '';
  }

  /**
   * Sanitiza el nombre de archivo (para guardar).
   * Conserva letras de cualquier alfabeto; el resto pasa a '_'.
   */
  static sanitizeFilename(filename: string): string {
    let sanitized = filename
      .replace(/[^\p{L}\p{M}\p{N}._-]/gu, '_')
      .replace(/_{2,}/g, '_')
      .trim();

    if (!this.getExtension(filename)) {
      sanitized += '.bin';
    }

    if (sanitized.length > MAX_FILENAME_LENGTH) {
      const ext = this.getExtension(sanitized);
      const nameWithoutExt = sanitized.slice(0, sanitized.length - ext.length - 1);
      sanitized = `${nameWithoutExt.slice(0, 250)}.${ext}`;
    }

    return sanitized;
  }

  /**
   * Nombre con que se guarda un documento en el storage:
   * {cedula}_{nombre-apellido}_{tipoDocumento}.{ext}
   *
   * @example
   * buildStoredFilename(
   *   { citizenId: '1234567890123', firstName: 'Somchai', lastName: 'Dee' },
   *   'id_card',
   *   'scan.PDF',
   * ); // '1234567890123_Somchai-Dee_id_card.pdf'
   */
  static buildStoredFilename(
    applicant: { citizenId: string; firstName: string; lastName: string },
    documentType: string,
    originalName: string,
  ): string {
    const fullName = `${applicant.firstName}-${applicant.lastName}`.replace(/\s+/g, '-');
    const safeDocType = documentType.replace(/[\s/]+/g, '-');
    const extension = this.getExtension(originalName) || 'bin';

    return this.sanitizeFilename(
      `${applicant.citizenId}_${fullName}_${safeDocType}.${extension}`,
    );
  }
}
