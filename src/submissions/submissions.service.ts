import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import * as crypto from 'crypto';
import { SubmittedDocument } from './entities/submitted-document.entity';
import { SubmissionDraftsService } from './submission-drafts.service';
import type { DraftSummary, ReceiptDocument, SubmissionReceipt } from './submission.types';
import { TracksService } from '../tracks/tracks.service';
import { ApplicantProfile, ApplicantsService } from '../applicants/applicants.service';
import { AuditService } from '../common/audit.service';
import {
  ChecklistError,
  SubmissionInProgressError,
} from '../common/errors/checklist.errors';
import { FileValidator } from '../common/validators/file.validator';
import {
  DOCUMENT_STORAGE,
  DocumentStorage,
  StoredFileRef,
} from '../storage-client/document-storage';
import type { IncomingFile, SubmissionState, UploadedDocument } from '../checklist/checklist.types';
import {
  assertReadyForSubmission,
  attachFile,
  createSubmissionState,
  detachFile,
  evaluateChecklist,
  getDocument,
  getPhase,
  isReadyForSubmission,
  markSubmitted,
  selectTrack,
} from '../checklist/submission-state';

interface StoredUpload {
  document: UploadedDocument;
  ref: StoredFileRef;
}

/**
 * Orquesta el paso de carga de documentos de la inscripción.
 *
 * El borrador vive en SubmissionDraftsService; las reglas de validación son
 * las funciones puras de checklist/submission-state. Este service solo
 * resuelve el postulante y la ruta, guarda el nuevo estado y, al enviar,
 * reenvía los archivos al storage y registra la metadata en BD.
 */
@Injectable()
export class SubmissionsService {
  private readonly logger = new Logger(SubmissionsService.name);
  // Postulantes con un envío en curso (entre la verificación y markSubmitted)
  private readonly submitting = new Set<string>();

  constructor(
    @InjectRepository(SubmittedDocument)
    private readonly repo: Repository<SubmittedDocument>,
    private readonly tracks: TracksService,
    private readonly drafts: SubmissionDraftsService,
    private readonly applicants: ApplicantsService,
    private readonly audit: AuditService,
    @Inject(DOCUMENT_STORAGE)
    private readonly storage: DocumentStorage,
  ) {}

  /**
   * Abre el borrador del postulante o le cambia la ruta.
   * Si el borrador anterior ya fue enviado, empieza uno nuevo.
   *
   * @throws {UnknownTrackError} Si la ruta no existe
   */
  async openDraft(userId: string, trackId: string): Promise<DraftSummary> {
    const profile = await this.applicants.getProfileByUserId(userId);
    this.assertNotSubmitting(profile.applicantId);
    const requirements = this.tracks.getRequirements(trackId);

    const existing = this.drafts.find(profile.applicantId);
    const state =
      !existing || existing.submittedAt
        ? createSubmissionState(profile.applicantId, trackId)
        : selectTrack(existing, trackId, requirements);

    this.drafts.save(state);
    this.logger.log(`Draft for applicant ${profile.applicantId} on track ${trackId}`);
    return this.summarize(state, profile);
  }

  async getDraft(userId: string): Promise<DraftSummary> {
    const profile = await this.applicants.getProfileByUserId(userId);
    return this.summarize(this.drafts.get(profile.applicantId), profile);
  }

  /**
   * Adjunta o reemplaza el archivo de un tipo de documento.
   * Si el archivo no es válido el borrador queda igual que antes.
   */
  async attach(
    userId: string,
    documentType: string,
    file: IncomingFile,
  ): Promise<DraftSummary> {
    const profile = await this.applicants.getProfileByUserId(userId);
    this.assertNotSubmitting(profile.applicantId);
    const state = this.drafts.get(profile.applicantId);
    const requirements = this.tracks.getRequirements(state.trackId);

    let next: SubmissionState;
    try {
      next = attachFile(state, documentType, file, requirements);
    } catch (error) {
      if (error instanceof ChecklistError) {
        this.logger.warn(
          `Rejected ${documentType} upload for applicant ${profile.applicantId}: ${error.code}`,
        );
      }
      throw error;
    }

    this.drafts.save(next);
    await this.audit.logDocumentAttached(
      userId,
      profile.applicantId,
      documentType,
      file.originalName,
      file.size,
    );
    return this.summarize(next, profile);
  }

  async detach(userId: string, documentType: string): Promise<DraftSummary> {
    const profile = await this.applicants.getProfileByUserId(userId);
    this.assertNotSubmitting(profile.applicantId);
    const state = this.drafts.get(profile.applicantId);

    const next = detachFile(state, documentType);
    if (next !== state) {
      this.drafts.save(next);
      await this.audit.logDocumentDetached(userId, profile.applicantId, documentType);
    }
    return this.summarize(next, profile);
  }

  /**
   * Descarta el borrador abierto (y los archivos que tenía en memoria).
   *
   * @throws {DraftNotFoundError} Si no hay borrador abierto
   * @throws {SubmissionInProgressError} Si el envío está en curso
   */
  async discardDraft(userId: string): Promise<void> {
    const profile = await this.applicants.getProfileByUserId(userId);
    this.assertNotSubmitting(profile.applicantId);
    this.drafts.get(profile.applicantId);

    this.drafts.discard(profile.applicantId);
    await this.audit.log({
      actorUserId: userId,
      action: 'DRAFT_DISCARDED',
      entity: 'applicant',
      entityId: profile.applicantId,
    });
  }

  /**
   * Envía el borrador: sube cada archivo al storage, registra la metadata en
   * una transacción y deja el borrador como SUBMITTED.
   *
   * El borrador queda reservado desde la verificación hasta el final, así un
   * segundo envío concurrente falla en vez de repetir las subidas. Si falla
   * una subida o la transacción, borra del storage los archivos ya subidos y
   * el borrador sigue abierto para reintentar.
   *
   * @throws {IncompleteSubmissionError} Si faltan documentos requeridos o alguno es inválido
   * @throws {SubmissionClosedError} Si el borrador ya fue enviado
   * @throws {SubmissionInProgressError} Si ya hay un envío en curso
   */
  async submit(userId: string): Promise<SubmissionReceipt> {
    const profile = await this.applicants.getProfileByUserId(userId);
    const { applicantId } = profile;

    // Sin await entre la lectura y la reserva
    this.assertNotSubmitting(applicantId);
    const state = this.drafts.get(applicantId);
    const requirements = this.tracks.getRequirements(state.trackId);
    assertReadyForSubmission(state, requirements);
    this.submitting.add(applicantId);

    try {
      const documents = requirements
        .map((r) => getDocument(state, r.documentType))
        .filter((doc): doc is UploadedDocument => doc !== undefined);

      const uploads = await this.storeAll(profile, documents);
      const submissionId = crypto.randomUUID();

      let rows: SubmittedDocument[];
      try {
        rows = await this.repo.manager.transaction(async (manager) => {
          const repo = manager.getRepository(SubmittedDocument);
          const saved: SubmittedDocument[] = [];
          for (const upload of uploads) {
            saved.push(await this.persist(repo, submissionId, state, upload));
          }
          return saved;
        });
      } catch (error) {
        this.logger.error(
          `Could not record submission ${submissionId} for applicant ${applicantId}, rolling back ${uploads.length} files`,
        );
        await this.rollback(uploads);
        throw error;
      }

      const receiptDocuments: ReceiptDocument[] = rows.map((row) => ({
        documentType: row.documentType,
        storedFileName: row.storedFileName,
        storageFileId: row.storageFileId,
        sizeBytes: row.sizeBytes,
        checksum: row.checksum,
        version: row.version,
      }));

      const submittedAt = new Date();
      this.drafts.save(markSubmitted(state, submittedAt));

      await this.audit.logDocumentsSubmitted(
        userId,
        submissionId,
        state.trackId,
        receiptDocuments.map((d) => d.storedFileName),
      );
      this.logger.log(
        `✅ Submission ${submissionId}: ${receiptDocuments.length} documents for applicant ${applicantId}`,
      );

      return {
        submissionId,
        applicantId,
        trackId: state.trackId,
        submittedAt,
        documents: receiptDocuments,
      };
    } finally {
      this.submitting.delete(applicantId);
    }
  }

  /**
   * Documentos vigentes ya enviados por el postulante, del más reciente al más antiguo.
   */
  async listSubmitted(userId: string): Promise<SubmittedDocument[]> {
    const profile = await this.applicants.getProfileByUserId(userId);
    return this.repo.find({
      where: { applicantId: profile.applicantId, isCurrent: true },
      order: { createdAt: 'DESC' },
    });
  }

  /**
   * @throws {NotFoundException} Si el documento no existe o no es del postulante
   */
  async downloadSubmitted(
    userId: string,
    documentId: string,
  ): Promise<{ document: SubmittedDocument; content: Buffer }> {
    const profile = await this.applicants.getProfileByUserId(userId);
    const document = await this.repo.findOne({
      where: { id: documentId, applicantId: profile.applicantId },
    });
    if (!document) {
      throw new NotFoundException(`Document ${documentId} not found`);
    }

    const content = await this.storage.download(document.storageFileId);
    return { document, content };
  }

  private async storeAll(
    profile: ApplicantProfile,
    documents: UploadedDocument[],
  ): Promise<StoredUpload[]> {
    const uploads: StoredUpload[] = [];
    try {
      for (const document of documents) {
        const ref = await this.storage.store({
          applicantId: profile.applicantId,
          documentType: document.documentType,
          storedFileName: FileValidator.buildStoredFilename(
            profile,
            document.documentType,
            document.fileName,
          ),
          contentType: document.contentType,
          content: document.content,
        });
        uploads.push({ document, ref });
      }
    } catch (error) {
      this.logger.error(
        `Storage upload failed for applicant ${profile.applicantId}, rolling back ${uploads.length} files`,
      );
      await this.rollback(uploads);
      throw error;
    }
    return uploads;
  }

  private async rollback(uploads: StoredUpload[]): Promise<void> {
    for (const { ref } of uploads) {
      try {
        await this.storage.delete(ref.id);
      } catch (error) {
        this.logger.error(
          `Rollback could not delete stored file ${ref.id}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }
  }

  /**
   * Registra un documento enviado con versionado automático.
   * Marca la versión anterior del mismo tipo como no vigente.
   */
  private async persist(
    repo: Repository<SubmittedDocument>,
    submissionId: string,
    state: SubmissionState,
    { document, ref }: StoredUpload,
  ): Promise<SubmittedDocument> {
    const prev = await repo.findOne({
      where: {
        applicantId: state.applicantId,
        documentType: document.documentType,
        isCurrent: true,
      },
      select: ['id', 'version'],
    });

    if (prev) {
      await repo.update(prev.id, { isCurrent: false });
    }

    const checksum = crypto
      .createHash('sha256')
      .update(document.content)
      .digest('hex');

    const row = repo.create({
      submissionId,
      applicantId: state.applicantId,
      trackId: state.trackId,
      documentType: document.documentType,
      originalFileName: document.fileName,
      storedFileName: ref.storedFileName,
      storageFileId: ref.id,
      contentType: document.contentType,
      sizeBytes: document.sizeBytes,
      checksum,
      version: (prev?.version ?? 0) + 1,
      isCurrent: true,
    });

    return repo.save(row);
  }

  private assertNotSubmitting(applicantId: string): void {
    if (this.submitting.has(applicantId)) {
      throw new SubmissionInProgressError(applicantId);
    }
  }

  private summarize(state: SubmissionState, profile: ApplicantProfile): DraftSummary {
    const track = this.tracks.getTrack(state.trackId);
    return {
      applicant: {
        title: profile.title,
        firstName: profile.firstName,
        lastName: profile.lastName,
      },
      trackId: track.id,
      trackLabel: track.label,
      phase: getPhase(state, track.requirements),
      ready: isReadyForSubmission(state, track.requirements),
      submittedAt: state.submittedAt,
      checklist: evaluateChecklist(state, track.requirements),
    };
  }
}
