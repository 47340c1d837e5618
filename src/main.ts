import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import helmet from 'helmet';
import hpp from 'hpp';
import compression from 'compression';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const config = app.get(ConfigService);
  const logger = new Logger('Bootstrap');

  const isProduction = config.get<string>('NODE_ENV') === 'production';

  // Seguridad: Helmet
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          imgSrc: ["'self'", 'data:'],
          objectSrc: ["'none'"],
          frameSrc: ["'none'"],
        },
      },
      frameguard: { action: 'deny' },
    }),
  );

  // Seguridad: HPP Protection (HTTP Parameter Pollution)
  app.use(hpp());

  // Performance: compresión de respuestas (las descargas de PDF e imágenes ya vienen comprimidas)
  app.use(compression({ level: 6 }));

  const allowedOrigins = config
    .get<string>('CORS_ORIGINS')
    ?.split(',')
    .map((o) => o.trim())
    .filter(Boolean) ?? ['http://localhost:5173', 'http://localhost:3000'];

  if (isProduction && !config.get<string>('CORS_ORIGINS')) {
    throw new Error('CORS_ORIGINS must be set in production environment');
  }

  app.enableCors({
    origin: (origin, callback) => {
      // Permitir requests sin origin (curl, health checks)
      if (!origin || allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error(`CORS: Origin ${origin} not allowed`));
      }
    },
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
    optionsSuccessStatus: 204,
  });

  configureApp(app);

  const port = config.get<string>('PORT') ?? 3000;
  await app.listen(port);

  logger.log(`🚀 Application is running on: http://localhost:${port}/api`);
  logger.log(`✅ CORS enabled for: ${allowedOrigins.join(', ')}`);
  logger.log(`🔐 Environment: ${isProduction ? 'PRODUCTION' : 'DEVELOPMENT'}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Application failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
