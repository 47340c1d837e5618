import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Put,
  Res,
  UploadedFile,
  UseFilters,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import type { Response } from 'express';
import { SubmissionsService } from './submissions.service';
import { SelectTrackDto } from './dto/select-track.dto';
import { UploadLimitFilter } from './upload-limit.filter';
import { sendStoredDocument } from './send-stored-document';
import { MAX_UPLOAD_BYTES } from '../tracks/track.constants';
import { Roles } from '../auth/roles.decorator';
import { CurrentUser } from '../auth/current-user.decorator';

/**
 * Paso "subir documentos" del formulario de inscripción.
 *
 * El borrador es del postulante autenticado (sub del token); no existe
 * forma de operar sobre el borrador de otro usuario.
 */
@Controller('submissions')
@Roles('APPLICANT')
export class SubmissionsController {
  constructor(private readonly submissions: SubmissionsService) {}

  /**
   * Abre el borrador o cambia la ruta de inscripción.
   *
   * @example
   * POST /api/submissions/current
   * Body: { "trackId": "cyber-security-weekend" }
   */
  @Post('current')
  @HttpCode(HttpStatus.OK)
  open(@CurrentUser('sub') userId: string, @Body() dto: SelectTrackDto) {
    return this.submissions.openDraft(userId, dto.trackId);
  }

  @Get('current')
  current(@CurrentUser('sub') userId: string) {
    return this.submissions.getDraft(userId);
  }

  /** Descarta el borrador y los archivos adjuntos */
  @Delete('current')
  @HttpCode(HttpStatus.NO_CONTENT)
  async discard(@CurrentUser('sub') userId: string): Promise<void> {
    await this.submissions.discardDraft(userId);
  }

  /**
   * Adjunta el archivo de un tipo de documento (campo multipart "file").
   * Reemplaza el anterior si ya había uno.
   *
   * @example
   * PUT /api/submissions/current/documents/id_card
   */
  @Put('current/documents/:documentType')
  @UseFilters(UploadLimitFilter)
  @UseInterceptors(FileInterceptor('file', { limits: { fileSize: MAX_UPLOAD_BYTES } }))
  attach(
    @CurrentUser('sub') userId: string,
    @Param('documentType') documentType: string,
    @UploadedFile() file: Express.Multer.File | undefined,
  ) {
    if (!file) {
      throw new BadRequestException('No file provided');
    }

    return this.submissions.attach(userId, documentType, {
      originalName: file.originalname,
      mimeType: file.mimetype,
      size: file.size,
      buffer: file.buffer,
    });
  }

  @Delete('current/documents/:documentType')
  detach(
    @CurrentUser('sub') userId: string,
    @Param('documentType') documentType: string,
  ) {
    return this.submissions.detach(userId, documentType);
  }

  /**
   * Envía todos los documentos adjuntos.
   * Responde 409 con la lista de documentos faltantes si el borrador no está listo.
   */
  @Post('current/submit')
  @HttpCode(HttpStatus.CREATED)
  submit(@CurrentUser('sub') userId: string) {
    return this.submissions.submit(userId);
  }

  @Get('mine')
  async mine(@CurrentUser('sub') userId: string) {
    const items = await this.submissions.listSubmitted(userId);
    return { items };
  }

  @Get('mine/:documentId/download')
  async download(
    @CurrentUser('sub') userId: string,
    @Param('documentId', new ParseUUIDPipe()) documentId: string,
    @Res() res: Response,
  ) {
    const { document, content } = await this.submissions.downloadSubmitted(
      userId,
      documentId,
    );

    sendStoredDocument(res, document, content);
  }
}
