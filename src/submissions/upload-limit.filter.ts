import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  Logger,
  PayloadTooLargeException,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { FileTooLargeError } from '../common/errors/checklist.errors';
import { MAX_UPLOAD_BYTES } from '../tracks/track.constants';

/**
 * Multer corta los archivos sobre MAX_UPLOAD_BYTES antes de que lleguen al
 * validador; este filtro responde igual que FileTooLargeError para el slot
 * de la ruta. El tamaño informado es el Content-Length del request.
 */
@Catch(PayloadTooLargeException)
export class UploadLimitFilter implements ExceptionFilter {
  private readonly logger = new Logger(UploadLimitFilter.name);

  catch(_exception: PayloadTooLargeException, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    const contentLength = Number(request.headers['content-length']);
    const error = new FileTooLargeError(
      request.params.documentType ?? '',
      Number.isFinite(contentLength) ? contentLength : MAX_UPLOAD_BYTES + 1,
      MAX_UPLOAD_BYTES,
    );

    this.logger.warn(`${error.code}: upload over ${MAX_UPLOAD_BYTES} bytes`);
    response.status(error.statusCode).json(error.toResponse());
  }
}
