import { DataSource } from 'typeorm';
import { createTestDataSource } from '@/database/testing/test-data-source';
import { CourseEntity, StudentEntity } from '@/database/entities';
import { StorageUnavailableError } from '@/common/errors/matching.errors';
import { LoggerService } from '@/shared/logger/logger.service';
import { StudyGroupRepository } from './study-group.repository';

describe('StudyGroupRepository', () => {
  let dataSource: DataSource;
  let repository: StudyGroupRepository;
  let math: CourseEntity;
  let cs: CourseEntity;
  let zoe: StudentEntity;
  let adam: StudentEntity;
  let mia: StudentEntity;

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    repository = new StudyGroupRepository(dataSource, new LoggerService());

    const courses = dataSource.getRepository(CourseEntity);
    math = await courses.save({ code: 'MATH201', name: 'Discrete Mathematics' });
    cs = await courses.save({ code: 'CS101', name: 'Intro to Computer Science' });

    const students = dataSource.getRepository(StudentEntity);
    zoe = await students.save({ name: 'Zoe', email: 'zoe@example.edu', preferredGroupSize: 3 });
    adam = await students.save({ name: 'Adam', email: 'adam@example.edu', preferredGroupSize: 3 });
    mia = await students.save({ name: 'Mia', email: 'mia@example.edu', preferredGroupSize: 3 });
  });

  afterEach(async () => {
    if (dataSource.isInitialized) await dataSource.destroy();
  });

  it('writes groups and reads them back by course code and index', async () => {
    await repository.transaction(async (sink) => {
      await sink.clearAllGroups();
      await sink.writeGroup(math.id, 1, [mia.id]);
      await sink.writeGroup(cs.id, 2, [adam.id]);
      await sink.writeGroup(cs.id, 1, [zoe.id, adam.id]);
    });

    const groups = await repository.findAllWithMembers();

    expect(
      groups.map((g) => [g.courseCode, g.groupIndex, g.members.map((m) => m.name)]),
    ).toEqual([
      ['CS101', 1, ['Adam', 'Zoe']],
      ['CS101', 2, ['Adam']],
      ['MATH201', 1, ['Mia']],
    ]);
    expect(groups[0]).toMatchObject({
      courseId: cs.id,
      courseName: 'Intro to Computer Science',
    });
    expect(groups[0].members[0]).toEqual({
      id: adam.id,
      name: 'Adam',
      email: 'adam@example.edu',
    });
  });

  it('returns the new group id from writeGroup', async () => {
    const ids = await repository.transaction(async (sink) => [
      await sink.writeGroup(cs.id, 1, [zoe.id]),
      await sink.writeGroup(cs.id, 2, [adam.id]),
    ]);

    const groups = await repository.findAllWithMembers();
    expect(groups.map((g) => g.groupId)).toEqual(ids);
  });

  it('clears groups of every course', async () => {
    await repository.transaction(async (sink) => {
      await sink.writeGroup(math.id, 1, [mia.id]);
      await sink.writeGroup(cs.id, 1, [zoe.id]);
    });

    await repository.transaction(async (sink) => {
      await sink.clearAllGroups();
      await sink.writeGroup(cs.id, 1, [adam.id]);
    });

    const groups = await repository.findAllWithMembers();
    expect(groups.map((g) => [g.courseCode, g.members.map((m) => m.id)])).toEqual([
      ['CS101', [adam.id]],
    ]);
  });

  it('rolls back the clear when the work fails', async () => {
    await repository.transaction(async (sink) => {
      await sink.writeGroup(cs.id, 1, [zoe.id]);
    });

    await expect(
      repository.transaction(async (sink) => {
        await sink.clearAllGroups();
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    const groups = await repository.findAllWithMembers();
    expect(groups.map((g) => g.members.map((m) => m.name))).toEqual([['Zoe']]);
  });

  it('wraps constraint failures as unavailable storage', async () => {
    await expect(
      repository.transaction(async (sink) => {
        await sink.writeGroup(cs.id, 1, [999]);
      }),
    ).rejects.toBeInstanceOf(StorageUnavailableError);

    expect(await repository.findAllWithMembers()).toEqual([]);
  });
});
