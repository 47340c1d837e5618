/**
 * Colaborador externo que guarda los documentos validados.
 * Los archivos quedan asociados al postulante y al tipo de documento.
 */
export const DOCUMENT_STORAGE = Symbol('DOCUMENT_STORAGE');

export interface StoreDocumentInput {
  applicantId: string;
  documentType: string;
  storedFileName: string;
  contentType: string;
  content: Buffer;
}

export interface StoredFileRef {
  id: string;
  storedFileName: string;
}

export interface DocumentStorage {
  store(input: StoreDocumentInput): Promise<StoredFileRef>;
  download(fileId: string): Promise<Buffer>;
  delete(fileId: string): Promise<void>;
}
