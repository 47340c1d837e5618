import { SetMetadata } from '@nestjs/common';
import type { UserRole } from './current-user.decorator';

/**
 * Clave de metadata para almacenar roles requeridos.
 * Utilizada por RolesGuard para verificar acceso.
 */
export const ROLES_KEY = 'roles';

/**
 * Restringe un controlador o método a ciertos roles.
 *
 * @example
 * @Controller('submissions')
 * @Roles('APPLICANT')
 * export class SubmissionsController {}
 */
export const Roles = (...roles: UserRole[]) => SetMetadata(ROLES_KEY, roles);
