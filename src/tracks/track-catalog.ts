import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import type { ValidationError as ClassValidationError } from 'class-validator';
import {
  ConfigurationError,
  UnknownTrackError,
} from '../common/errors/checklist.errors';
import { TrackCatalogConfigDto, TrackConfigDto } from './dto/track-config.dto';
import type { DocumentRequirement, Track, TrackSummary } from './track.types';

/**
 * Catálogo inmutable de rutas de inscripción y sus documentos requeridos.
 *
 * Se construye una sola vez al arrancar. Los tracks y requisitos quedan
 * congelados y conservan el orden del archivo de configuración, que es el
 * orden en que se muestran al postulante.
 */
export class TrackCatalog {
  private readonly tracks: ReadonlyMap<string, Track>;

  constructor(tracks: readonly Track[]) {
    if (tracks.length === 0) {
      throw new ConfigurationError('Track catalog is empty');
    }

    const byId = new Map<string, Track>();
    for (const track of tracks) {
      if (byId.has(track.id)) {
        throw new ConfigurationError(`Duplicate track id: ${track.id}`, {
          trackId: track.id,
        });
      }
      if (track.requirements.length === 0) {
        throw new ConfigurationError(`Track ${track.id} has no requirements`, {
          trackId: track.id,
        });
      }

      const seen = new Set<string>();
      for (const req of track.requirements) {
        if (seen.has(req.documentType)) {
          throw new ConfigurationError(
            `Duplicate document type ${req.documentType} in track ${track.id}`,
            { trackId: track.id, documentType: req.documentType },
          );
        }
        seen.add(req.documentType);
      }

      byId.set(track.id, freezeTrack(track));
    }

    this.tracks = byId;
  }

  /**
   * Construye el catálogo a partir del JSON ya parseado.
   * Lanza ConfigurationError con la lista de problemas si no es válido.
   */
  static fromConfig(raw: unknown): TrackCatalog {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new ConfigurationError(
        'Track catalog must be an object with a "tracks" array',
      );
    }

    const config = plainToInstance(TrackCatalogConfigDto, raw);
    const errors = validateSync(config, {
      whitelist: true,
      forbidNonWhitelisted: true,
    });
    if (errors.length > 0) {
      const problems = collectProblems(errors);
      throw new ConfigurationError(
        `Invalid track catalog: ${problems.join('; ')}`,
        { problems },
      );
    }

    return new TrackCatalog(config.tracks.map(toTrack));
  }

  list(): TrackSummary[] {
    return [...this.tracks.values()].map(({ id, label, description }) => ({
      id,
      label,
      description,
    }));
  }

  getTrack(trackId: string): Track {
    const track = this.tracks.get(trackId);
    if (!track) {
      throw new UnknownTrackError(trackId);
    }
    return track;
  }

  getRequirements(trackId: string): readonly DocumentRequirement[] {
    return this.getTrack(trackId).requirements;
  }
}

function toTrack(dto: TrackConfigDto): Track {
  return {
    id: dto.id,
    label: dto.label,
    description: dto.description,
    requirements: dto.requirements.map((r) => ({
      documentType: r.documentType,
      displayLabel: r.displayLabel,
      required: r.required,
      acceptedFormats: [...new Set(r.acceptedFormats)],
      maxSizeBytes: r.maxSizeBytes,
      description: r.description,
    })),
  };
}

function freezeTrack(track: Track): Track {
  const requirements = track.requirements.map((r) =>
    Object.freeze({
      ...r,
      acceptedFormats: Object.freeze([...r.acceptedFormats]),
    }),
  );
  return Object.freeze({ ...track, requirements: Object.freeze(requirements) });
}

function collectProblems(errors: ClassValidationError[], parent = ''): string[] {
  const problems: string[] = [];
  for (const error of errors) {
    const path = parent ? `${parent}.${error.property}` : error.property;
    for (const message of Object.values(error.constraints ?? {})) {
      problems.push(`${path}: ${message}`);
    }
    if (error.children && error.children.length > 0) {
      problems.push(...collectProblems(error.children, path));
    }
  }
  return problems;
}
