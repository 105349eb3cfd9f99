import { LoggerService } from '@/shared/logger/logger.service';
import { StorageUnavailableError } from '@/common/errors/matching.errors';
import { CourseMatchingOrchestrator } from './course-matching.orchestrator';
import { DEFAULT_GROUP_FORMATION_CONFIG } from '../constants/matching.constants';
import {
  InMemoryResultSink,
  InMemoryRosterProvider,
  student,
} from '../testing/in-memory.fakes';
import { CourseRosters } from '../types/matching.types';

function createOrchestrator(
  rosters: CourseRosters | InMemoryRosterProvider,
  sink: InMemoryResultSink,
) {
  return new CourseMatchingOrchestrator(
    rosters instanceof InMemoryRosterProvider
      ? rosters
      : new InMemoryRosterProvider(rosters),
    sink,
    DEFAULT_GROUP_FORMATION_CONFIG,
    new LoggerService(),
  );
}

describe('CourseMatchingOrchestrator', () => {
  let sink: InMemoryResultSink;

  beforeEach(() => {
    sink = new InMemoryResultSink();
  });

  it('forms groups per course and writes them after clearing everything', async () => {
    const shared = student(3, 3, [1]);
    const rosters: CourseRosters = new Map([
      [1, [student(1, 3, [1]), student(2, 3, [1]), shared]],
      [2, [shared, student(4, 3, [2])]],
    ]);

    const result = await createOrchestrator(rosters, sink).runMatching();

    expect([...result.entries()]).toEqual([
      [1, [[1, 2, 3]]],
      [2, [[3, 4]]],
    ]);
    expect(sink.calls).toEqual([
      'clear',
      'write 1#1 [1,2,3]',
      'write 2#1 [3,4]',
    ]);
    expect(sink.groups.map((g) => [g.courseId, g.groupIndex])).toEqual([
      [1, 1],
      [2, 1],
    ]);
  });

  it('numbers groups from 1 within each course', async () => {
    const rosters: CourseRosters = new Map([
      [5, [1, 2, 3, 4, 5, 6].map((id) => student(id, 2))],
    ]);

    await createOrchestrator(rosters, sink).runMatching();

    expect(sink.calls).toEqual([
      'clear',
      'write 5#1 [1,2]',
      'write 5#2 [3,4]',
      'write 5#3 [5,6]',
    ]);
  });

  it('skips courses without students', async () => {
    const rosters: CourseRosters = new Map([
      [1, []],
      [2, [student(7)]],
    ]);

    const result = await createOrchestrator(rosters, sink).runMatching();

    expect([...result.keys()]).toEqual([2]);
    expect(sink.calls).toEqual(['clear', 'write 2#1 [7]']);
  });

  it('leaves stored groups untouched when no course has students', async () => {
    sink.groups = [{ groupId: 9, courseId: 1, groupIndex: 1, memberIds: [1, 2] }];
    const rosters: CourseRosters = new Map([[1, []]]);

    const result = await createOrchestrator(rosters, sink).runMatching();

    expect(result.size).toBe(0);
    expect(sink.calls).toEqual([]);
    expect(sink.groups).toHaveLength(1);
  });

  it('keeps the previous groups when a write fails', async () => {
    const previous = [{ groupId: 9, courseId: 1, groupIndex: 1, memberIds: [1, 2] }];
    sink.groups = previous;
    sink.failOnWrite = 2;
    const rosters: CourseRosters = new Map([
      [1, [student(1), student(2), student(3)]],
      [2, [student(4), student(5)]],
    ]);

    await expect(
      createOrchestrator(rosters, sink).runMatching(),
    ).rejects.toBeInstanceOf(StorageUnavailableError);
    expect(sink.groups).toBe(previous);
  });

  it('writes nothing when the rosters cannot be loaded', async () => {
    const previous = [{ groupId: 9, courseId: 1, groupIndex: 1, memberIds: [1, 2] }];
    sink.groups = previous;
    const provider = new InMemoryRosterProvider(new Map([[1, [student(1), student(2)]]]));
    provider.failWith = new StorageUnavailableError('database is locked');

    await expect(
      createOrchestrator(provider, sink).runMatching(),
    ).rejects.toBeInstanceOf(StorageUnavailableError);
    expect(sink.calls).toEqual([]);
    expect(sink.groups).toBe(previous);
  });

  it('produces identical results for identical rosters', async () => {
    const rosters: CourseRosters = new Map([
      [1, [student(1, 2, [1]), student(2, 5, [2]), student(3, 3, [1, 2]), student(4, 4)]],
    ]);
    const orchestrator = createOrchestrator(rosters, sink);

    const first = await orchestrator.runMatching();
    const second = await orchestrator.runMatching();

    expect(JSON.stringify([...second])).toBe(JSON.stringify([...first]));
  });
});
