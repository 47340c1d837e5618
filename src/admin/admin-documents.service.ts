import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import { SubmittedDocument } from '../submissions/entities/submitted-document.entity';
import { SubmissionDraftsService } from '../submissions/submission-drafts.service';
import { AuditService } from '../common/audit.service';
import { DOCUMENT_STORAGE, DocumentStorage } from '../storage-client/document-storage';
import { ListSubmittedDocumentsDto } from './dto/list-submitted-documents.dto';

export interface DocumentStats {
  /** Postulantes con al menos un documento vigente */
  applicants: number;
  /** Envíos realizados, incluidos los reemplazados */
  submissions: number;
  /** Documentos vigentes */
  documents: number;
  /** Borradores abiertos en este momento */
  openDrafts: number;
  /** Postulantes con documentos vigentes, por ruta */
  applicantsByTrack: Record<string, number>;
  /** Documentos vigentes, por tipo */
  documentsByType: Record<string, number>;
}

/**
 * Revisión de documentos enviados por parte del staff.
 * Solo lectura: el staff no modifica envíos.
 */
@Injectable()
export class AdminDocumentsService {
  constructor(
    @InjectRepository(SubmittedDocument)
    private readonly repo: Repository<SubmittedDocument>,
    private readonly drafts: SubmissionDraftsService,
    private readonly audit: AuditService,
    @Inject(DOCUMENT_STORAGE)
    private readonly storage: DocumentStorage,
  ) {}

  /**
   * Documentos vigentes, del más reciente al más antiguo.
   *
   * @example
   * list({ trackId: 'cyber-security-weekend' })
   */
  async list(filter: ListSubmittedDocumentsDto): Promise<SubmittedDocument[]> {
    const where: FindOptionsWhere<SubmittedDocument> = { isCurrent: true };
    if (filter.applicantId) where.applicantId = filter.applicantId;
    if (filter.trackId) where.trackId = filter.trackId;
    if (filter.documentType) where.documentType = filter.documentType;

    return this.repo.find({ where, order: { createdAt: 'DESC' } });
  }

  /**
   * Descarga cualquier documento enviado (vigente o histórico) y lo registra en auditoría.
   *
   * @throws {NotFoundException} Si el documento no existe
   */
  async download(
    userId: string,
    documentId: string,
  ): Promise<{ document: SubmittedDocument; content: Buffer }> {
    const document = await this.repo.findOne({ where: { id: documentId } });
    if (!document) {
      throw new NotFoundException(`Document ${documentId} not found`);
    }

    const content = await this.storage.download(document.storageFileId);
    await this.audit.log({
      actorUserId: userId,
      action: 'DOCUMENT_DOWNLOADED',
      entity: 'submitted_document',
      entityId: document.id,
      meta: { applicantId: document.applicantId, documentType: document.documentType },
    });
    return { document, content };
  }

  async getStats(): Promise<DocumentStats> {
    const rows = await this.repo.find({
      select: ['submissionId', 'applicantId', 'trackId', 'documentType', 'isCurrent'],
    });
    const current = rows.filter((r) => r.isCurrent);

    const applicantsByTrack = new Map<string, number>();
    const tracksSeen = new Set<string>();
    const documentsByType = new Map<string, number>();
    for (const row of current) {
      const key = `${row.trackId}:${row.applicantId}`;
      if (!tracksSeen.has(key)) {
        tracksSeen.add(key);
        applicantsByTrack.set(row.trackId, (applicantsByTrack.get(row.trackId) ?? 0) + 1);
      }
      documentsByType.set(row.documentType, (documentsByType.get(row.documentType) ?? 0) + 1);
    }

    return {
      applicants: new Set(current.map((r) => r.applicantId)).size,
      submissions: new Set(rows.map((r) => r.submissionId)).size,
      documents: current.length,
      openDrafts: this.drafts.countOpen(),
      applicantsByTrack: Object.fromEntries(applicantsByTrack),
      documentsByType: Object.fromEntries(documentsByType),
    };
  }
}
