/**
 * Regla de un documento dentro de una ruta de inscripción.
 * Los formatos aceptados son extensiones en minúscula, sin punto.
 */
export interface DocumentRequirement {
  readonly documentType: string;
  readonly displayLabel: string;
  readonly required: boolean;
  readonly acceptedFormats: readonly string[];
  readonly maxSizeBytes: number;
  readonly description?: string;
}

/** Variante de horario/programa elegida por el postulante */
export interface Track {
  readonly id: string;
  readonly label: string;
  readonly description?: string;
  readonly requirements: readonly DocumentRequirement[];
}

export type TrackSummary = Pick<Track, 'id' | 'label' | 'description'>;
