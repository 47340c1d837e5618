import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';

export interface AuditLogData {
  actorUserId?: string;
  action: string;
  entity: string;
  entityId?: string;
  meta?: Record<string, unknown>;
}

/**
 * Service para registro de auditoría de los documentos.
 *
 * Registra en la tabla audit_logs:
 * - Archivos adjuntados y quitados del borrador
 * - Envíos completos (con los tipos de documento enviados)
 *
 * Los logs no bloquean el flujo principal si falla el registro.
 */
@Injectable()
export class AuditService {
  private readonly logger = new Logger(AuditService.name);

  constructor(private readonly dataSource: DataSource) {}

  /**
   * Registra una acción en el log de auditoría.
   * No lanza errores si falla para no interrumpir el flujo principal.
   *
   * @example
   * await log({ action: 'DOCUMENT_ATTACHED', entity: 'applicant', entityId: 'uuid-123', actorUserId: 'uuid-user' });
   */
  async log(data: AuditLogData): Promise<void> {
    try {
      await this.dataSource.query(
        `INSERT INTO audit_logs (actor_user_id, action, entity, entity_id, meta)
         VALUES ($1, $2, $3, $4, $5)`,
        [
          data.actorUserId || null,
          data.action,
          data.entity,
          data.entityId || null,
          data.meta ? JSON.stringify(data.meta) : null,
        ],
      );

      this.logger.log(
        `Audit: ${data.action} on ${data.entity}${data.entityId ? ` (${data.entityId})` : ''} by ${data.actorUserId || 'SYSTEM'}`,
      );
    } catch (error) {
      this.logger.error(`Failed to write audit log: ${error}`);
    }
  }

  async logDocumentAttached(
    userId: string,
    applicantId: string,
    documentType: string,
    fileName: string,
    sizeBytes: number,
  ): Promise<void> {
    return this.log({
      actorUserId: userId,
      action: 'DOCUMENT_ATTACHED',
      entity: 'applicant',
      entityId: applicantId,
      meta: { documentType, fileName, sizeBytes },
    });
  }

  async logDocumentDetached(
    userId: string,
    applicantId: string,
    documentType: string,
  ): Promise<void> {
    return this.log({
      actorUserId: userId,
      action: 'DOCUMENT_DETACHED',
      entity: 'applicant',
      entityId: applicantId,
      meta: { documentType },
    });
  }

  async logDocumentsSubmitted(
    userId: string,
    submissionId: string,
    trackId: string,
    storedFileNames: string[],
  ): Promise<void> {
    return this.log({
      actorUserId: userId,
      action: 'DOCUMENTS_SUBMITTED',
      entity: 'submission',
      entityId: submissionId,
      meta: {
        trackId,
        files: storedFileNames,
        timestamp: new Date().toISOString(),
      },
    });
  }
}
