import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';

export type UserRole = 'ADMIN' | 'REVIEWER' | 'APPLICANT';

/**
 * Payload JWT del usuario autenticado.
 * Inyectado en req.user por JwtAuthGuard.
 */
export interface JwtPayload {
  /** ID del usuario (UUID) */
  sub: string;
  /** Rol del usuario */
  role: UserRole;
  email?: string;
  /** Timestamp de emisión del token (issued at) */
  iat?: number;
  /** Timestamp de expiración del token */
  exp?: number;
}

export type AuthenticatedRequest = Request & { user?: JwtPayload };

/**
 * Decorador de parámetro para inyectar el usuario autenticado.
 *
 * @param data - Clave opcional de JwtPayload para extraer solo un campo
 *
 * @example
 * @Get('current')
 * current(@CurrentUser('sub') userId: string) {}
 */
export const CurrentUser = createParamDecorator(
  (data: keyof JwtPayload | undefined, ctx: ExecutionContext) => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    const user = request.user;

    return data ? user?.[data] : user;
  },
);
