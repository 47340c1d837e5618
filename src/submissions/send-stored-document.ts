import { HttpStatus } from '@nestjs/common';
import type { Response } from 'express';
import type { SubmittedDocument } from './entities/submitted-document.entity';

/**
 * Responde con el contenido de un documento enviado como descarga.
 * res.attachment agrega filename* (UTF-8) para nombres fuera de ASCII.
 */
export function sendStoredDocument(
  res: Response,
  document: Pick<SubmittedDocument, 'storedFileName' | 'contentType'>,
  content: Buffer,
): void {
  res.attachment(document.storedFileName);
  res.set({
    'Content-Type': document.contentType,
    'Content-Length': String(content.length),
  });
  res.status(HttpStatus.OK).send(content);
}
