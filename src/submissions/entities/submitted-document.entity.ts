import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from 'typeorm';

/**
 * Documento enviado al storage como parte de un envío.
 * Un nuevo envío del mismo tipo deja la fila anterior con isCurrent = false.
 */
@Entity('submitted_documents')
@Index(['applicantId', 'documentType', 'isCurrent'])
export class SubmittedDocument {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  // Todas las filas de un mismo envío comparten submissionId
  @Column('uuid', { name: 'submission_id' })
  submissionId!: string;

  @Column('uuid', { name: 'applicant_id' })
  applicantId!: string;

  @Column({ name: 'track_id', type: 'text' })
  trackId!: string;

  @Column({ name: 'document_type', type: 'text' })
  documentType!: string;

  @Column({ name: 'original_filename', type: 'text' })
  originalFileName!: string;

  @Column({ name: 'stored_filename', type: 'text' })
  storedFileName!: string;

  @Column({ name: 'storage_file_id', type: 'text' })
  storageFileId!: string;

  @Column({ name: 'content_type', type: 'text' })
  contentType!: string;

  @Column({
    name: 'size_bytes',
    type: 'bigint',
    transformer: {
      to: (v: number) => v,
      from: (v: string | number) => Number(v),
    },
  })
  sizeBytes!: number;

  @Column({ name: 'checksum', type: 'text' })
  checksum!: string;

  @Column({ name: 'version', type: 'int', default: 1 })
  version!: number;

  @Column({ name: 'is_current', type: 'boolean', default: true })
  isCurrent!: boolean;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;
}
