import { Module } from '@nestjs/common';
import { StorageClientService } from './storage-client.service';
import { DOCUMENT_STORAGE } from './document-storage';

@Module({
  providers: [
    StorageClientService,
    { provide: DOCUMENT_STORAGE, useExisting: StorageClientService },
  ],
  exports: [DOCUMENT_STORAGE],
})
export class StorageClientModule {}
