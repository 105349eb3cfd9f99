import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { StudentEntity } from '@/database/entities';
import { toStorageError } from '@/common/errors/matching.errors';
import {
  CourseRosters,
  RosterProvider,
  RosterStudent,
} from '../types/matching.types';

/**
 * Reads every student with their enrollments and availability and groups
 * them by course. Courses come out in ascending id order, students within a
 * course in ascending id order; the engine's tie-breaks depend on it.
 */
@Injectable()
export class RosterRepository implements RosterProvider {
  constructor(
    @InjectRepository(StudentEntity)
    private readonly students: Repository<StudentEntity>,
  ) {}

  async loadRosters(): Promise<CourseRosters> {
    let rows: StudentEntity[];
    try {
      rows = await this.students.find({
        relations: { courses: true, availability: true },
        order: { id: 'ASC' },
      });
    } catch (error) {
      throw toStorageError(error, 'Failed to load course rosters');
    }

    const courseIds = [
      ...new Set(rows.flatMap((row) => row.courses.map((c) => c.id))),
    ].sort((a, b) => a - b);

    const rosters: CourseRosters = new Map(
      courseIds.map((id): [number, RosterStudent[]] => [id, []]),
    );

    for (const row of rows) {
      const student: RosterStudent = {
        id: row.id,
        preferredGroupSize: row.preferredGroupSize,
        availabilitySlotIds: new Set(row.availability.map((slot) => slot.id)),
      };
      for (const course of row.courses) {
        rosters.get(course.id)?.push(student);
      }
    }

    return rosters;
  }
}
