import { SetMetadata } from '@nestjs/common';

/**
 * Clave de metadata para marcar endpoints públicos.
 * Utilizada por JwtAuthGuard para permitir acceso sin autenticación.
 */
export const IS_PUBLIC_KEY = 'isPublic';

/**
 * Marca un endpoint o controlador como público (sin token).
 * Por defecto todos los endpoints están protegidos por JwtAuthGuard.
 *
 * @example
 * @Controller('tracks')
 * @Public()
 * export class TracksController {}
 */
export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);
