import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { ConfigurationError } from '../common/errors/checklist.errors';
import { TrackCatalog } from './track-catalog';
import type { DocumentRequirement, Track, TrackSummary } from './track.types';

export const DEFAULT_TRACKS_CONFIG_PATH = 'config/tracks.json';

/**
 * Service que expone el catálogo de rutas de inscripción.
 *
 * Lee TRACKS_CONFIG_PATH una sola vez al crear el módulo; si el archivo no
 * existe o no es válido, lanza ConfigurationError y la aplicación no arranca.
 */
@Injectable()
export class TracksService {
  private readonly logger = new Logger(TracksService.name);
  private readonly catalog: TrackCatalog;

  constructor(private readonly config: ConfigService) {
    const path = resolve(
      process.cwd(),
      this.config.get<string>('TRACKS_CONFIG_PATH') ?? DEFAULT_TRACKS_CONFIG_PATH,
    );
    this.catalog = TrackCatalog.fromConfig(readCatalogFile(path));
    this.logger.log(
      `Track catalog loaded from ${path}: ${this.catalog.list().map((t) => t.id).join(', ')}`,
    );
  }

  list(): TrackSummary[] {
    return this.catalog.list();
  }

  getTrack(trackId: string): Track {
    return this.catalog.getTrack(trackId);
  }

  /**
   * Lista ordenada de documentos para una ruta.
   * @throws {UnknownTrackError} Si la ruta no existe
   */
  getRequirements(trackId: string): readonly DocumentRequirement[] {
    return this.catalog.getRequirements(trackId);
  }
}

function readCatalogFile(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read track catalog at ${path}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  try {
    return JSON.parse(text) as unknown;
  } catch (error) {
    throw new ConfigurationError(`Track catalog at ${path} is not valid JSON`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}
