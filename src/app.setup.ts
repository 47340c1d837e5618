import { INestApplication, ValidationPipe } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { JwtAuthGuard } from './auth/jwt-auth.guard';
import { RolesGuard } from './auth/roles.guard';
import { ChecklistErrorFilter } from './common/filters/checklist-error.filter';

/**
 * Configuración común de la aplicación HTTP.
 * La usan main.ts y los tests e2e para que ambos se comporten igual.
 */
export function configureApp(app: INestApplication): INestApplication {
  // Validación global
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  // Errores del checklist → { statusCode, error: { code, message, details } }
  app.useGlobalFilters(new ChecklistErrorFilter());

  // Guards globales: TODOS los endpoints requieren autenticación por defecto
  const reflector = app.get(Reflector);
  app.useGlobalGuards(
    new JwtAuthGuard(app.get(JwtService), app.get(ConfigService), reflector),
    new RolesGuard(reflector),
  );

  app.setGlobalPrefix('api');
  return app;
}
