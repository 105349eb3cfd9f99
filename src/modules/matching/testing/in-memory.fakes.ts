import { StorageUnavailableError } from '@/common/errors/matching.errors';
import {
  CourseRosters,
  ResultSink,
  RosterProvider,
  RosterStudent,
  TransactionalResultSink,
} from '../types/matching.types';

export function student(
  id: number,
  preferredGroupSize = 3,
  slots: number[] = [],
): RosterStudent {
  return { id, preferredGroupSize, availabilitySlotIds: new Set(slots) };
}

export class InMemoryRosterProvider implements RosterProvider {
  loads = 0;
  /** Thrown from the next loadRosters call when set */
  failWith: Error | null = null;

  constructor(private readonly rosters: CourseRosters = new Map()) {}

  async loadRosters(): Promise<CourseRosters> {
    this.loads++;
    if (this.failWith) throw this.failWith;
    return new Map(this.rosters);
  }
}

export interface StoredGroup {
  groupId: number;
  courseId: number;
  groupIndex: number;
  memberIds: number[];
}

/**
 * Stages writes and publishes them to `groups` only when the transaction's
 * work resolves.
 */
export class InMemoryResultSink implements TransactionalResultSink {
  groups: StoredGroup[] = [];
  readonly calls: string[] = [];
  /** Fail the nth writeGroup call (1-based) */
  failOnWrite: number | null = null;
  /** Awaited before the transaction starts */
  gate: Promise<void> | null = null;

  private nextId = 1;

  async transaction<T>(work: (sink: ResultSink) => Promise<T>): Promise<T> {
    if (this.gate) await this.gate;

    let staged = [...this.groups];
    let writes = 0;
    const sink: ResultSink = {
      clearAllGroups: async () => {
        this.calls.push('clear');
        staged = [];
      },
      writeGroup: async (courseId, groupIndex, memberIds) => {
        writes++;
        if (this.failOnWrite === writes) {
          throw new StorageUnavailableError('disk full');
        }
        this.calls.push(`write ${courseId}#${groupIndex} [${memberIds.join(',')}]`);
        const groupId = this.nextId++;
        staged.push({ groupId, courseId, groupIndex, memberIds: [...memberIds] });
        return groupId;
      },
    };

    const result = await work(sink);
    this.groups = staged;
    return result;
  }
}
