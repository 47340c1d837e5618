import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';
import FormData from 'form-data';
import type {
  DocumentStorage,
  StoreDocumentInput,
  StoredFileRef,
} from './document-storage';

// Categoría y entidad con que el storage service clasifica los archivos
const FILE_CATEGORY = 'DOCUMENT';
const ENTITY_TYPE = 'APPLICANT';

interface StorageUploadResponse {
  id?: string;
  storedFilename?: string;
  file?: { id: string; storedFilename?: string };
}

@Injectable()
export class StorageClientService implements DocumentStorage {
  private readonly logger = new Logger(StorageClientService.name);
  private readonly client: AxiosInstance;

  constructor(private readonly config: ConfigService) {
    const baseURL = this.config.get<string>('STORAGE_SERVICE_URL');
    const apiKey = this.config.get<string>('STORAGE_SERVICE_API_KEY');

    if (!baseURL || !apiKey) {
      throw new Error(
        'STORAGE_SERVICE_URL and STORAGE_SERVICE_API_KEY must be configured',
      );
    }

    this.client = axios.create({
      baseURL,
      timeout: 30000,
      headers: {
        'X-API-Key': apiKey,
      },
    });

    this.logger.log(`Storage client initialized: ${baseURL}`);
  }

  /**
   * Upload a validated document to storage service
   */
  async store(input: StoreDocumentInput): Promise<StoredFileRef> {
    const formData = new FormData();
    formData.append('file', input.content, {
      filename: input.storedFileName,
      contentType: input.contentType,
    });
    formData.append('category', FILE_CATEGORY);
    formData.append('entityType', ENTITY_TYPE);
    formData.append('entityId', input.applicantId);
    formData.append('uploadedBy', input.applicantId);
    formData.append('description', input.documentType);

    try {
      this.logger.debug(`Uploading file to storage: ${input.storedFileName}`);

      const response = await this.client.post<StorageUploadResponse>(
        '/storage/upload',
        formData,
        { headers: formData.getHeaders() },
      );

      // El storage responde {success, file} o directamente la metadata
      const id = response.data.file?.id ?? response.data.id;
      if (!id) {
        throw new Error('Storage service response did not include a file id');
      }

      this.logger.log(`File uploaded successfully: ${id}`);
      return {
        id,
        storedFileName:
          response.data.file?.storedFilename ??
          response.data.storedFilename ??
          input.storedFileName,
      };
    } catch (error) {
      this.logFailure('Upload', error);
      throw error;
    }
  }

  /**
   * Download a file from storage
   */
  async download(fileId: string): Promise<Buffer> {
    try {
      const response = await this.client.get<ArrayBuffer>(
        `/storage/download/${encodeURIComponent(fileId)}`,
        { responseType: 'arraybuffer' },
      );
      return Buffer.from(response.data);
    } catch (error) {
      this.logFailure('Download', error);
      throw error;
    }
  }

  /**
   * Delete a file (soft delete)
   */
  async delete(fileId: string): Promise<void> {
    try {
      await this.client.delete(`/storage/${encodeURIComponent(fileId)}`);
    } catch (error) {
      this.logFailure('Delete', error);
      throw error;
    }
  }

  private logFailure(operation: string, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`${operation} failed: ${message}`);
    if (axios.isAxiosError(error) && error.response) {
      this.logger.error(`Response status: ${error.response.status}`);
      this.logger.error(`Response data: ${JSON.stringify(error.response.data)}`);
    }
  }
}
