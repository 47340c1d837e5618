import { Controller, Get, Param, ParseUUIDPipe, Query, Res } from '@nestjs/common';
import type { Response } from 'express';
import { AdminDocumentsService } from './admin-documents.service';
import { ListSubmittedDocumentsDto } from './dto/list-submitted-documents.dto';
import { sendStoredDocument } from '../submissions/send-stored-document';
import { Roles } from '../auth/roles.decorator';
import { CurrentUser } from '../auth/current-user.decorator';

/**
 * Revisión de documentos enviados y resumen del sistema.
 *
 * @path /admin
 * @roles ADMIN, REVIEWER
 */
@Controller('admin')
@Roles('ADMIN', 'REVIEWER')
export class AdminDocumentsController {
  constructor(private readonly documents: AdminDocumentsService) {}

  /**
   * @example
   * GET /api/admin/documents?trackId=cyber-security-weekday&documentType=transcript
   */
  @Get('documents')
  async list(@Query() query: ListSubmittedDocumentsDto) {
    const items = await this.documents.list(query);
    return { items };
  }

  @Get('documents/:documentId/download')
  async download(
    @CurrentUser('sub') userId: string,
    @Param('documentId', new ParseUUIDPipe()) documentId: string,
    @Res() res: Response,
  ) {
    const { document, content } = await this.documents.download(userId, documentId);
    sendStoredDocument(res, document, content);
  }

  /**
   * @example
   * GET /api/admin/stats
   * Response: { "applicants": 12, "submissions": 14, "documents": 40, "openDrafts": 3, ... }
   */
  @Get('stats')
  stats() {
    return this.documents.getStats();
  }
}
