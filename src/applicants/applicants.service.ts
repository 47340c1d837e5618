import { Injectable, NotFoundException } from '@nestjs/common';
import { DataSource } from 'typeorm';

/** Datos del postulante que se muestran en el formulario (solo lectura) */
export interface ApplicantProfile {
  applicantId: string;
  title: string | null;
  firstName: string;
  lastName: string;
  citizenId: string;
}

interface ApplicantRow {
  applicant_id: string;
  title: string | null;
  first_name: string | null;
  last_name: string | null;
  citizen_id: string | null;
}

/**
 * Service de solo lectura sobre los postulantes.
 *
 * Las tablas users y applicants pertenecen al sistema de registro; aquí solo
 * se consultan para mostrar la cabecera del formulario y armar el nombre con
 * que se guardan los archivos.
 */
@Injectable()
export class ApplicantsService {
  constructor(private readonly ds: DataSource) {}

  /**
   * Obtiene el perfil del postulante asociado a un usuario.
   *
   * @param userId - ID del usuario (sub del token)
   * @throws {NotFoundException} Si el usuario no tiene postulante asociado
   */
  async getProfileByUserId(userId: string): Promise<ApplicantProfile> {
    const rows: ApplicantRow[] = await this.ds.query(
      `SELECT ap.id AS applicant_id,
              ap.title,
              ap.first_name,
              ap.last_name,
              ap.citizen_id
         FROM users u
         JOIN applicants ap ON ap.id = u.applicant_id
        WHERE u.id = $1
        LIMIT 1`,
      [userId],
    );

    const row = rows[0];
    if (!row || !row.citizen_id) {
      throw new NotFoundException('Applicant profile not found');
    }

    return {
      applicantId: row.applicant_id,
      title: row.title,
      firstName: (row.first_name ?? '').trim(),
      lastName: (row.last_name ?? '').trim(),
      citizenId: row.citizen_id,
    };
  }
}
