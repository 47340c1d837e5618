import { IsOptional, IsUUID, Matches } from 'class-validator';

export class ListSubmittedDocumentsDto {
  @IsOptional()
  @IsUUID()
  applicantId?: string;

  @IsOptional()
  @Matches(/^[a-z0-9-]+$/, { message: 'trackId has an invalid format' })
  trackId?: string;

  @IsOptional()
  @Matches(/^[a-z0-9_]+$/, { message: 'documentType has an invalid format' })
  documentType?: string;
}
