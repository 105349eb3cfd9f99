import { Injectable } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, In } from 'typeorm';
import {
  CourseEntity,
  StudentEntity,
  TimeSlotEntity,
} from '@/database/entities';
import { EVENTS } from '@/events/events.constant';
import { toStorageError } from '@/common/errors/matching.errors';
import { LoggerService } from '@/shared/logger/logger.service';
import { clampGroupSize } from '@/modules/matching/services/target-size';
import { StudentDto, UpsertStudentDto } from './dto/upsert-student.dto';
import { StudentSavedEvent } from './events/student-saved.event';

function toStudentDto(student: StudentEntity): StudentDto {
  return {
    id: student.id,
    name: student.name,
    email: student.email,
    preferredGroupSize: student.preferredGroupSize,
    courseIds: student.courses.map((c) => c.id).sort((a, b) => a - b),
    availabilityTimeslotIds: student.availability
      .map((t) => t.id)
      .sort((a, b) => a - b),
  };
}

@Injectable()
export class StudentsService {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly logger: LoggerService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Newest students first, with their course and availability ids
   */
  async findAll(): Promise<StudentDto[]> {
    try {
      const students = await this.dataSource.getRepository(StudentEntity).find({
        relations: { courses: true, availability: true },
        order: { createdAt: 'DESC', id: 'DESC' },
      });
      return students.map(toStudentDto);
    } catch (error) {
      throw toStorageError(error, 'Failed to list students');
    }
  }

  /**
   * Create or update a student by email. Course and availability sets are
   * replaced, not merged; repeated ids collapse and ids that match no course
   * or timeslot are dropped. A size of 0 counts as not given.
   */
  async upsert(dto: UpsertStudentDto): Promise<StudentDto> {
    const preferredGroupSize = clampGroupSize(dto.preferredGroupSize || undefined);
    const courseIds = [...new Set(dto.courseIds ?? [])];
    const timeslotIds = [...new Set(dto.availabilityTimeslotIds ?? [])];

    let saved: StudentEntity;
    try {
      saved = await this.dataSource.transaction(async (manager) => {
        const courses = courseIds.length
          ? await manager.findBy(CourseEntity, { id: In(courseIds) })
          : [];
        const availability = timeslotIds.length
          ? await manager.findBy(TimeSlotEntity, { id: In(timeslotIds) })
          : [];

        const existing = await manager.findOne(StudentEntity, {
          where: { email: dto.email },
        });
        const student = existing ?? manager.create(StudentEntity, { email: dto.email });

        student.name = dto.name;
        student.preferredGroupSize = preferredGroupSize;
        student.courses = courses;
        student.availability = availability;

        return manager.save(student);
      });
    } catch (error) {
      throw toStorageError(error, `Failed to save student ${dto.email}`);
    }

    this.logger.log(
      `Student ${saved.id} saved with ${saved.courses.length} courses`,
      StudentsService.name,
    );
    // group listings embed member names
    await this.eventEmitter.emitAsync(
      EVENTS.STUDENT_SAVED,
      new StudentSavedEvent(saved.id, saved.email),
    );
    return toStudentDto(saved);
  }
}
