import type { ChecklistItem, SubmissionPhase } from '../checklist/checklist.types';

/** Vista del borrador que consume el formulario */
export interface DraftSummary {
  applicant: {
    title: string | null;
    firstName: string;
    lastName: string;
  };
  trackId: string;
  trackLabel: string;
  phase: SubmissionPhase;
  ready: boolean;
  submittedAt: Date | null;
  checklist: ChecklistItem[];
}

export interface ReceiptDocument {
  documentType: string;
  storedFileName: string;
  storageFileId: string;
  sizeBytes: number;
  checksum: string;
  version: number;
}

export interface SubmissionReceipt {
  submissionId: string;
  applicantId: string;
  trackId: string;
  submittedAt: Date;
  documents: ReceiptDocument[];
}
