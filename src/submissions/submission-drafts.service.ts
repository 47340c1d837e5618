import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ConfigurationError,
  DraftNotFoundError,
} from '../common/errors/checklist.errors';
import type { SubmissionState } from '../checklist/checklist.types';

const DEFAULT_DRAFT_TTL_MINUTES = 24 * 60;

interface DraftEntry {
  state: SubmissionState;
  touchedAt: number;
}

/**
 * Borradores de envío en memoria, uno por postulante.
 *
 * Duran lo que dura la sesión del formulario: expiran tras DRAFT_TTL_MINUTES
 * sin actividad y su contenido (los archivos) se descarta.
 */
@Injectable()
export class SubmissionDraftsService {
  private readonly logger = new Logger(SubmissionDraftsService.name);
  private readonly drafts = new Map<string, DraftEntry>();
  private readonly ttlMs: number;

  constructor(private readonly config: ConfigService) {
    const raw = this.config.get<string>('DRAFT_TTL_MINUTES');
    const minutes = raw === undefined ? DEFAULT_DRAFT_TTL_MINUTES : Number(raw);
    if (!Number.isFinite(minutes) || minutes <= 0) {
      throw new ConfigurationError(
        `DRAFT_TTL_MINUTES must be a positive number, got "${raw}"`,
      );
    }
    this.ttlMs = minutes * 60 * 1000;
  }

  find(applicantId: string): SubmissionState | undefined {
    const entry = this.drafts.get(applicantId);
    if (!entry) return undefined;

    if (this.isExpired(entry, Date.now())) {
      this.drafts.delete(applicantId);
      this.logger.log(`Draft expired for applicant ${applicantId}`);
      return undefined;
    }
    return entry.state;
  }

  /**
   * @throws {DraftNotFoundError} Si no hay borrador abierto (o expiró)
   */
  get(applicantId: string): SubmissionState {
    const state = this.find(applicantId);
    if (!state) {
      throw new DraftNotFoundError(applicantId);
    }
    return state;
  }

  save(state: SubmissionState): SubmissionState {
    const now = Date.now();
    this.sweep(now);
    this.drafts.set(state.applicantId, { state, touchedAt: now });
    return state;
  }

  discard(applicantId: string): void {
    this.drafts.delete(applicantId);
  }

  get size(): number {
    return this.drafts.size;
  }

  /** Borradores vigentes que todavía no se enviaron */
  countOpen(): number {
    const now = Date.now();
    let open = 0;
    for (const entry of this.drafts.values()) {
      if (!this.isExpired(entry, now) && entry.state.submittedAt === null) {
        open += 1;
      }
    }
    return open;
  }

  private sweep(now: number): void {
    for (const [applicantId, entry] of this.drafts) {
      if (this.isExpired(entry, now)) {
        this.drafts.delete(applicantId);
      }
    }
  }

  private isExpired(entry: DraftEntry, now: number): boolean {
    return now - entry.touchedAt > this.ttlMs;
  }
}
