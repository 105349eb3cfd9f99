import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager } from 'typeorm';
import { StudyGroupEntity, StudyGroupMemberEntity } from '@/database/entities';
import { toStorageError } from '@/common/errors/matching.errors';
import { LoggerService } from '@/shared/logger/logger.service';
import {
  GroupView,
  ResultSink,
  TransactionalResultSink,
} from '../types/matching.types';

/** ResultSink bound to one transaction's entity manager. */
class TransactionResultSink implements ResultSink {
  constructor(private readonly manager: EntityManager) {}

  async clearAllGroups(): Promise<void> {
    try {
      await this.manager
        .createQueryBuilder()
        .delete()
        .from(StudyGroupMemberEntity)
        .execute();
      await this.manager
        .createQueryBuilder()
        .delete()
        .from(StudyGroupEntity)
        .execute();
    } catch (error) {
      throw toStorageError(error, 'Failed to clear study groups');
    }
  }

  async writeGroup(
    courseId: number,
    groupIndex: number,
    memberIds: number[],
  ): Promise<number> {
    try {
      const group = await this.manager.save(
        this.manager.create(StudyGroupEntity, { courseId, groupIndex }),
      );

      if (memberIds.length > 0) {
        await this.manager.insert(
          StudyGroupMemberEntity,
          memberIds.map((studentId) => ({ groupId: group.id, studentId })),
        );
      }

      return group.id;
    } catch (error) {
      throw toStorageError(
        error,
        `Failed to write group ${groupIndex} of course ${courseId}`,
      );
    }
  }
}

function byName(a: { name: string; id: number }, b: { name: string; id: number }) {
  if (a.name !== b.name) return a.name < b.name ? -1 : 1;
  return a.id - b.id;
}

@Injectable()
export class StudyGroupRepository implements TransactionalResultSink {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly logger: LoggerService,
  ) {}

  /* ================== Writes ================== */

  async transaction<T>(work: (sink: ResultSink) => Promise<T>): Promise<T> {
    try {
      return await this.dataSource.transaction((manager) =>
        work(new TransactionResultSink(manager)),
      );
    } catch (error) {
      this.logger.error(
        'Study group transaction rolled back',
        error instanceof Error ? error.stack : String(error),
        StudyGroupRepository.name,
      );
      throw toStorageError(error, 'Study group transaction failed');
    }
  }

  /* ================== Reads ================== */

  /**
   * All stored groups with course and member details, ordered by course
   * code then group index; members ordered by name.
   */
  async findAllWithMembers(): Promise<GroupView[]> {
    let groups: StudyGroupEntity[];
    try {
      groups = await this.dataSource.getRepository(StudyGroupEntity).find({
        relations: { course: true, members: { student: true } },
        order: { course: { code: 'ASC' }, groupIndex: 'ASC' },
      });
    } catch (error) {
      throw toStorageError(error, 'Failed to read study groups');
    }

    return groups.map((group) => ({
      groupId: group.id,
      courseId: group.courseId,
      courseCode: group.course.code,
      courseName: group.course.name,
      groupIndex: group.groupIndex,
      members: group.members
        .map(({ student }) => ({
          id: student.id,
          name: student.name,
          email: student.email,
        }))
        .sort(byName),
    }));
  }
}
