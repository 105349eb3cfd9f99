import { Injectable, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { LoggerService } from '@/shared/logger/logger.service';
import { CourseEntity, TimeSlotEntity } from './entities';
import seedData from './seed-data.json';

/**
 * Inserts the default courses and timeslots. Rows that already exist
 * (matched on their unique code / label) are left untouched.
 */
@Injectable()
export class DatabaseSeeder implements OnApplicationBootstrap {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly configService: ConfigService,
    private readonly logger: LoggerService,
  ) {}

  async onApplicationBootstrap() {
    if (!this.configService.get<boolean>('database.seed', true)) return;
    await this.seed();
  }

  async seed(): Promise<void> {
    const inserted = await this.dataSource.transaction(async (manager) => {
      const coursesBefore = await manager.count(CourseEntity);
      const timeslotsBefore = await manager.count(TimeSlotEntity);

      await manager
        .createQueryBuilder()
        .insert()
        .into(CourseEntity)
        .values(seedData.courses)
        .orIgnore()
        .execute();

      await manager
        .createQueryBuilder()
        .insert()
        .into(TimeSlotEntity)
        .values(seedData.timeslots)
        .orIgnore()
        .execute();

      return {
        courses: (await manager.count(CourseEntity)) - coursesBefore,
        timeslots: (await manager.count(TimeSlotEntity)) - timeslotsBefore,
      };
    });

    this.logger.log(
      `Seeded ${inserted.courses} courses and ${inserted.timeslots} timeslots`,
      DatabaseSeeder.name,
    );
  }
}
