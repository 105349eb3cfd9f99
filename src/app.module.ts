import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';

import {
  appConfig,
  databaseConfig,
  matchingConfig,
  throttleConfig,
} from './config';
import { appEnvSchema } from './config/validation/app.schema';
import { DatabaseModule } from './database/database.module';
import { SharedModule } from './shared/shared.module';
import { HealthModule } from './modules/health/health.module';
import { CatalogModule } from './modules/catalog/catalog.module';
import { StudentsModule } from './modules/students/students.module';

// Event Emitter
import { EventEmitterModule } from '@nestjs/event-emitter';

// Engines modules
import { MatchingModule } from './modules/matching/matching.module';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, databaseConfig, matchingConfig, throttleConfig],
      envFilePath: ['.env', '.env.local'],
      validationSchema: appEnvSchema,
    }),

    // Rate limiting
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        throttlers: [
          {
            ttl: configService.get<number>('throttle.ttl', 60) * 1000,
            limit: configService.get<number>('throttle.limit', 100),
          },
        ],
      }),
    }),

    // Event Emitter module
    EventEmitterModule.forRoot(),

    // Core modules
    DatabaseModule,
    SharedModule,

    // Engines modules
    MatchingModule,

    // Feature modules
    CatalogModule,
    StudentsModule,
    HealthModule,
  ],
  providers: [{ provide: APP_GUARD, useClass: ThrottlerGuard }],
})
export class AppModule {}
