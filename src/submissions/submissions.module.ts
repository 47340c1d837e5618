import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { SubmittedDocument } from './entities/submitted-document.entity';
import { SubmissionsService } from './submissions.service';
import { SubmissionDraftsService } from './submission-drafts.service';
import { SubmissionsController } from './submissions.controller';
import { TracksModule } from '../tracks/tracks.module';
import { ApplicantsModule } from '../applicants/applicants.module';
import { StorageClientModule } from '../storage-client/storage-client.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([SubmittedDocument]),
    TracksModule,
    ApplicantsModule,
    StorageClientModule,
  ],
  providers: [SubmissionsService, SubmissionDraftsService],
  controllers: [SubmissionsController],
  exports: [SubmissionDraftsService],
})
export class SubmissionsModule {}
