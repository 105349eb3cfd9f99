import { registerAs } from '@nestjs/config';

export interface DatabaseConfig {
  /** SQLite file, or `:memory:` */
  path: string;
  synchronize: boolean;
  /** Insert the default courses and timeslots on startup */
  seed: boolean;
}

export const databaseConfig = registerAs(
  'database',
  (): DatabaseConfig => ({
    path: process.env.DATABASE_PATH || 'study_groups.db',
    synchronize: (process.env.DATABASE_SYNCHRONIZE || 'true') === 'true',
    seed: (process.env.DATABASE_SEED || 'true') === 'true',
  }),
);
