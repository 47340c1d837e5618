import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { APP_GUARD } from '@nestjs/core';

import { CommonModule } from './common/common.module';
import { AuthModule } from './auth/auth.module';
import { TracksModule } from './tracks/tracks.module';
import { ApplicantsModule } from './applicants/applicants.module';
import { StorageClientModule } from './storage-client/storage-client.module';
import { SubmissionsModule } from './submissions/submissions.module';
import { AdminModule } from './admin/admin.module';

import { AppController } from './app.controller';

@Module({
  imports: [
    // Carga variables de entorno y las deja disponibles globalmente
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
    }),

    // Rate Limiting (Throttling)
    ThrottlerModule.forRoot([
      {
        name: 'short',
        ttl: 1000, // 1 segundo
        limit: 10,
      },
      {
        name: 'medium',
        ttl: 60000, // 1 minuto
        limit: 100,
      },
    ]),

    // TypeORM (usamos DATABASE_URL del .env)
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (cfg: ConfigService) => {
        const url = cfg.get<string>('DATABASE_URL');
        if (!url) throw new Error('DATABASE_URL not set');

        const ssl =
          (cfg.get<string>('DATABASE_SSL') ?? '').toLowerCase() === 'true'
            ? { rejectUnauthorized: false }
            : false;

        return {
          type: 'postgres' as const,
          url,
          ssl,
          autoLoadEntities: true, // carga entidades de todos los módulos
          synchronize: false, // el esquema está en sql/
        };
      },
    }),

    CommonModule,
    AuthModule,
    TracksModule,
    ApplicantsModule,
    StorageClientModule,
    SubmissionsModule,
    AdminModule,
  ],
  controllers: [AppController],
  providers: [
    // Aplicar throttling globalmente
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
