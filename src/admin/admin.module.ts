import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { SubmittedDocument } from '../submissions/entities/submitted-document.entity';
import { SubmissionsModule } from '../submissions/submissions.module';
import { StorageClientModule } from '../storage-client/storage-client.module';
import { AdminDocumentsService } from './admin-documents.service';
import { AdminDocumentsController } from './admin-documents.controller';

@Module({
  imports: [
    TypeOrmModule.forFeature([SubmittedDocument]),
    SubmissionsModule,
    StorageClientModule,
  ],
  providers: [AdminDocumentsService],
  controllers: [AdminDocumentsController],
})
export class AdminModule {}
