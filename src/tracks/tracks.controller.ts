import { Controller, Get, Param } from '@nestjs/common';
import { Public } from '../auth/public.decorator';
import { TracksService } from './tracks.service';

/**
 * Catálogo público de rutas de inscripción.
 * El formulario lo consulta para dibujar el selector de horario y el checklist.
 */
@Controller('tracks')
@Public()
export class TracksController {
  constructor(private readonly tracks: TracksService) {}

  /**
   * @example
   * GET /api/tracks
   * Response: { "items": [{ "id": "cyber-security-weekday", "label": "..." }] }
   */
  @Get()
  list() {
    return { items: this.tracks.list() };
  }

  /**
   * Documentos requeridos de una ruta, en orden de presentación.
   *
   * @example
   * GET /api/tracks/cyber-security-weekend/requirements
   */
  @Get(':trackId/requirements')
  requirements(@Param('trackId') trackId: string) {
    const track = this.tracks.getTrack(trackId);
    return { trackId: track.id, items: track.requirements };
  }
}
