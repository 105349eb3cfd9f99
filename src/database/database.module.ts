import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ENTITIES } from './entities';
import { DatabaseSeeder } from './database.seeder';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        type: 'better-sqlite3' as const,
        database: configService.get<string>('database.path', 'study_groups.db'),
        entities: ENTITIES,
        synchronize: configService.get<boolean>('database.synchronize', true),
      }),
    }),
  ],
  providers: [DatabaseSeeder],
})
export class DatabaseModule {}
