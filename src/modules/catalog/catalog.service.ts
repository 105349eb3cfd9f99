import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { CourseEntity, TimeSlotEntity } from '@/database/entities';
import { toStorageError } from '@/common/errors/matching.errors';

@Injectable()
export class CatalogService {
  constructor(
    @InjectRepository(CourseEntity)
    private readonly courses: Repository<CourseEntity>,
    @InjectRepository(TimeSlotEntity)
    private readonly timeslots: Repository<TimeSlotEntity>,
  ) {}

  async listCourses(): Promise<CourseEntity[]> {
    try {
      return await this.courses.find({ order: { code: 'ASC' } });
    } catch (error) {
      throw toStorageError(error, 'Failed to list courses');
    }
  }

  async listTimeslots(): Promise<TimeSlotEntity[]> {
    try {
      return await this.timeslots.find({
        order: { dayOfWeek: 'ASC', startTime: 'ASC' },
      });
    } catch (error) {
      throw toStorageError(error, 'Failed to list timeslots');
    }
  }
}
