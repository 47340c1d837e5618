import { ArgumentsHost, Catch, ExceptionFilter, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { ChecklistError } from '../errors/checklist.errors';

@Catch(ChecklistError)
export class ChecklistErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(ChecklistErrorFilter.name);

  catch(exception: ChecklistError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();

    this.logger.warn(`${exception.code}: ${exception.message}`);
    response.status(exception.statusCode).json(exception.toResponse());
  }
}
