import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { NotFoundException } from '@nestjs/common';
import { getRepositoryToken } from '@nestjs/typeorm';
import { createHash } from 'crypto';
import { SubmissionsService } from './submissions.service';
import { SubmissionDraftsService } from './submission-drafts.service';
import { SubmittedDocument } from './entities/submitted-document.entity';
import { TracksService } from '../tracks/tracks.service';
import { ApplicantsService } from '../applicants/applicants.service';
import { AuditService } from '../common/audit.service';
import { DOCUMENT_STORAGE } from '../storage-client/document-storage';
import { ChecklistItemStatus, IncomingFile, SubmissionPhase } from '../checklist/checklist.types';
import {
  DraftNotFoundError,
  FileTooLargeError,
  IncompleteSubmissionError,
  SubmissionClosedError,
  SubmissionInProgressError,
  UnknownTrackError,
} from '../common/errors/checklist.errors';
import {
  InMemoryDocumentStorage,
  InMemorySubmittedDocuments,
  TEST_PROFILE,
  createAuditMock,
} from '../../test/support/fakes';

const MB = 1024 * 1024;
const USER_ID = 'user-1';
const TRACK = 'cyber-security-track';

function pdf(name: string, size: number, body = 'test'): IncomingFile {
  return {
    originalName: name,
    mimeType: 'application/pdf',
    size,
    buffer: Buffer.from(`%PDF-1.4 ${body}`),
  };
}

function sha256(text: string): string {
  return createHash('sha256').update(Buffer.from(text)).digest('hex');
}

describe('SubmissionsService', () => {
  let service: SubmissionsService;
  let repo: InMemorySubmittedDocuments;
  let storage: InMemoryDocumentStorage;
  let audit: ReturnType<typeof createAuditMock>;

  beforeEach(async () => {
    repo = new InMemorySubmittedDocuments();
    storage = new InMemoryDocumentStorage();
    audit = createAuditMock();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SubmissionsService,
        SubmissionDraftsService,
        TracksService,
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: string) =>
              key === 'TRACKS_CONFIG_PATH' ? 'test/fixtures/tracks.json' : undefined,
            ),
          },
        },
        { provide: getRepositoryToken(SubmittedDocument), useValue: repo },
        {
          provide: ApplicantsService,
          useValue: { getProfileByUserId: jest.fn().mockResolvedValue(TEST_PROFILE) },
        },
        { provide: AuditService, useValue: audit },
        { provide: DOCUMENT_STORAGE, useValue: storage },
      ],
    }).compile();

    service = module.get<SubmissionsService>(SubmissionsService);
  });

  async function fillDraft(): Promise<void> {
    await service.openDraft(USER_ID, TRACK);
    await service.attach(USER_ID, 'id_card', pdf('id.pdf', 3 * MB, 'id'));
    await service.attach(USER_ID, 'transcript', pdf('grades.pdf', 2 * MB, 'grades'));
  }

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('openDraft', () => {
    it('should open an empty draft with the track checklist', async () => {
      const draft = await service.openDraft(USER_ID, TRACK);

      expect(draft.applicant).toEqual({ title: 'Ms.', firstName: 'Ana', lastName: 'Test' });
      expect(draft.trackLabel).toBe('Cyber Security');
      expect(draft.phase).toBe(SubmissionPhase.EMPTY);
      expect(draft.ready).toBe(false);
      expect(draft.checklist.map((i) => i.status)).toEqual([
        ChecklistItemStatus.MISSING,
        ChecklistItemStatus.MISSING,
        ChecklistItemStatus.OPTIONAL_EMPTY,
      ]);
    });

    it('should reject an unknown track without creating a draft', async () => {
      await expect(service.openDraft(USER_ID, 'pastry-track')).rejects.toThrow(UnknownTrackError);
      await expect(service.getDraft(USER_ID)).rejects.toThrow(DraftNotFoundError);
    });

    it('should keep compliant files when switching track', async () => {
      await service.openDraft(USER_ID, TRACK);
      await service.attach(USER_ID, 'id_card', pdf('id.pdf', MB));

      const draft = await service.openDraft(USER_ID, 'evening-track');

      expect(draft.trackId).toBe('evening-track');
      expect(draft.phase).toBe(SubmissionPhase.READY);
    });
  });

  describe('attach', () => {
    it('should attach a file and audit it', async () => {
      await service.openDraft(USER_ID, TRACK);

      const draft = await service.attach(USER_ID, 'id_card', pdf('id.pdf', 3 * MB));

      expect(draft.phase).toBe(SubmissionPhase.PARTIALLY_FILLED);
      expect(draft.checklist[0]).toMatchObject({
        documentType: 'id_card',
        status: ChecklistItemStatus.ATTACHED,
        fileName: 'id.pdf',
        sizeBytes: 3 * MB,
      });
      expect(audit.logDocumentAttached).toHaveBeenCalledWith(
        USER_ID,
        TEST_PROFILE.applicantId,
        'id_card',
        'id.pdf',
        3 * MB,
      );
    });

    it('should keep the draft unchanged when the file is rejected', async () => {
      await service.openDraft(USER_ID, TRACK);

      await expect(
        service.attach(USER_ID, 'id_card', {
          originalName: 'id.jpg',
          mimeType: 'image/jpeg',
          size: 6 * MB,
          buffer: Buffer.from([0xff, 0xd8, 0xff, 0xe0]),
        }),
      ).rejects.toThrow(FileTooLargeError);

      const draft = await service.getDraft(USER_ID);
      expect(draft.phase).toBe(SubmissionPhase.EMPTY);
      expect(audit.logDocumentAttached).not.toHaveBeenCalled();
    });

    it('should require an open draft', async () => {
      await expect(service.attach(USER_ID, 'id_card', pdf('id.pdf', MB))).rejects.toThrow(
        DraftNotFoundError,
      );
    });
  });

  describe('detach', () => {
    it('should remove the file and audit it', async () => {
      await service.openDraft(USER_ID, TRACK);
      await service.attach(USER_ID, 'id_card', pdf('id.pdf', MB));

      const draft = await service.detach(USER_ID, 'id_card');

      expect(draft.phase).toBe(SubmissionPhase.EMPTY);
      expect(audit.logDocumentDetached).toHaveBeenCalledWith(
        USER_ID,
        TEST_PROFILE.applicantId,
        'id_card',
      );
    });

    it('should not audit when nothing was attached', async () => {
      await service.openDraft(USER_ID, TRACK);

      await service.detach(USER_ID, 'transcript');

      expect(audit.logDocumentDetached).not.toHaveBeenCalled();
    });
  });

  describe('submit', () => {
    it('should store documents in checklist order and return a receipt', async () => {
      await fillDraft();

      const receipt = await service.submit(USER_ID);

      expect(receipt.applicantId).toBe(TEST_PROFILE.applicantId);
      expect(receipt.trackId).toBe(TRACK);
      expect(receipt.submittedAt).toBeInstanceOf(Date);
      expect(receipt.documents).toEqual([
        {
          documentType: 'id_card',
          storedFileName: '1234567890123_Ana-Test_id_card.pdf',
          storageFileId: 'file-1',
          sizeBytes: 3 * MB,
          checksum: sha256('%PDF-1.4 id'),
          version: 1,
        },
        {
          documentType: 'transcript',
          storedFileName: '1234567890123_Ana-Test_transcript.pdf',
          storageFileId: 'file-2',
          sizeBytes: 2 * MB,
          checksum: sha256('%PDF-1.4 grades'),
          version: 1,
        },
      ]);
      expect(repo.rows.every((row) => row.submissionId === receipt.submissionId)).toBe(true);
      expect(audit.logDocumentsSubmitted).toHaveBeenCalledWith(USER_ID, receipt.submissionId, TRACK, [
        '1234567890123_Ana-Test_id_card.pdf',
        '1234567890123_Ana-Test_transcript.pdf',
      ]);
    });

    it('should close the draft after submitting', async () => {
      await fillDraft();
      await service.submit(USER_ID);

      const draft = await service.getDraft(USER_ID);
      expect(draft.phase).toBe(SubmissionPhase.SUBMITTED);
      await expect(service.attach(USER_ID, 'id_card', pdf('id.pdf', MB))).rejects.toThrow(
        SubmissionClosedError,
      );
      await expect(service.submit(USER_ID)).rejects.toThrow(SubmissionClosedError);
    });

    it('should reject an incomplete draft without touching storage', async () => {
      await service.openDraft(USER_ID, TRACK);
      await service.attach(USER_ID, 'id_card', pdf('id.pdf', 3 * MB));

      const error = await service.submit(USER_ID).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(IncompleteSubmissionError);
      expect((error as IncompleteSubmissionError).issues).toEqual([
        { documentType: 'transcript', status: ChecklistItemStatus.MISSING },
      ]);
      expect(storage.store).not.toHaveBeenCalled();
      expect(repo.save).not.toHaveBeenCalled();
    });

    it('should roll back stored files when an upload fails', async () => {
      await fillDraft();
      storage.store
        .mockImplementationOnce(async (input) => ({ id: 'file-a', storedFileName: input.storedFileName }))
        .mockRejectedValueOnce(new Error('storage unavailable'));

      await expect(service.submit(USER_ID)).rejects.toThrow('storage unavailable');

      expect(storage.delete).toHaveBeenCalledWith('file-a');
      expect(repo.save).not.toHaveBeenCalled();
      const draft = await service.getDraft(USER_ID);
      expect(draft.phase).toBe(SubmissionPhase.READY);
    });

    it('should accept only one of two concurrent submits', async () => {
      await fillDraft();

      const results = await Promise.allSettled([service.submit(USER_ID), service.submit(USER_ID)]);

      expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected']);
      const rejected = results[1];
      expect(rejected.status === 'rejected' && rejected.reason).toBeInstanceOf(
        SubmissionInProgressError,
      );
      expect(storage.store).toHaveBeenCalledTimes(2);
      expect(repo.rows).toHaveLength(2);
    });

    it('should reject draft changes while a submit is in flight', async () => {
      await fillDraft();
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      storage.store.mockImplementationOnce(async (input) => {
        await gate;
        return { id: 'file-a', storedFileName: input.storedFileName };
      });

      const pending = service.submit(USER_ID);

      await expect(service.attach(USER_ID, 'id_card', pdf('id.pdf', MB))).rejects.toThrow(
        SubmissionInProgressError,
      );
      await expect(service.discardDraft(USER_ID)).rejects.toThrow(SubmissionInProgressError);

      release();
      await expect(pending).resolves.toMatchObject({ trackId: TRACK });
    });

    it('should delete stored files and rows when recording fails', async () => {
      await fillDraft();
      repo.save
        .mockImplementationOnce(async (row) => {
          row.id = 'row-1';
          repo.rows.push(row);
          return row;
        })
        .mockRejectedValueOnce(new Error('deadlock detected'));

      await expect(service.submit(USER_ID)).rejects.toThrow('deadlock detected');

      expect(storage.delete).toHaveBeenCalledWith('file-1');
      expect(storage.delete).toHaveBeenCalledWith('file-2');
      expect(storage.files.size).toBe(0);
      expect(repo.rows).toHaveLength(0);
      const draft = await service.getDraft(USER_ID);
      expect(draft.phase).toBe(SubmissionPhase.READY);
    });

    it('should keep the previous version current when recording a resubmission fails', async () => {
      await fillDraft();
      const first = await service.submit(USER_ID);
      await fillDraft();
      repo.save.mockRejectedValueOnce(new Error('connection lost'));

      await expect(service.submit(USER_ID)).rejects.toThrow('connection lost');

      expect(repo.rows.filter((r) => r.isCurrent).map((r) => r.submissionId)).toEqual([
        first.submissionId,
        first.submissionId,
      ]);
      expect(storage.files.size).toBe(2);

      const retry = await service.submit(USER_ID);
      expect(retry.documents.map((d) => d.version)).toEqual([2, 2]);
    });

    it('should version documents on a new submission', async () => {
      await fillDraft();
      const first = await service.submit(USER_ID);

      await fillDraft();
      const second = await service.submit(USER_ID);

      expect(second.submissionId).not.toBe(first.submissionId);
      expect(second.documents.map((d) => d.version)).toEqual([2, 2]);
      expect(repo.rows.filter((r) => r.isCurrent).map((r) => r.submissionId)).toEqual([
        second.submissionId,
        second.submissionId,
      ]);
    });
  });

  describe('discardDraft', () => {
    it('should drop the open draft and audit it', async () => {
      await service.openDraft(USER_ID, TRACK);

      await service.discardDraft(USER_ID);

      await expect(service.getDraft(USER_ID)).rejects.toThrow(DraftNotFoundError);
      expect(audit.log).toHaveBeenCalledWith({
        actorUserId: USER_ID,
        action: 'DRAFT_DISCARDED',
        entity: 'applicant',
        entityId: TEST_PROFILE.applicantId,
      });
    });

    it('should throw DraftNotFoundError without a draft', async () => {
      await expect(service.discardDraft(USER_ID)).rejects.toThrow(DraftNotFoundError);
      expect(audit.log).not.toHaveBeenCalled();
    });
  });

  describe('submitted documents', () => {
    it('should list only current documents', async () => {
      await fillDraft();
      await service.submit(USER_ID);

      const items = await service.listSubmitted(USER_ID);

      expect(items.map((d) => d.documentType)).toEqual(['transcript', 'id_card']);
      expect(repo.find).toHaveBeenCalledWith({
        where: { applicantId: TEST_PROFILE.applicantId, isCurrent: true },
        order: { createdAt: 'DESC' },
      });
    });

    it('should download a submitted document', async () => {
      await fillDraft();
      await service.submit(USER_ID);
      const [row] = repo.rows;

      const { document, content } = await service.downloadSubmitted(USER_ID, row.id);

      expect(document.documentType).toBe('id_card');
      expect(content.toString()).toBe('%PDF-1.4 id');
    });

    it('should throw NotFoundException for an unknown document', async () => {
      await expect(
        service.downloadSubmitted(USER_ID, '00000000-0000-4000-8000-999999999999'),
      ).rejects.toThrow(NotFoundException);
    });
  });
});
