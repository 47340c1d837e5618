import { Module } from '@nestjs/common';
import { ApplicantsService } from './applicants.service';

@Module({
  providers: [ApplicantsService],
  exports: [ApplicantsService],
})
export class ApplicantsModule {}
