/**
 * Student as seen by the group formation engine: only the fields that
 * influence compatibility.
 */
export interface RosterStudent {
  id: number;
  preferredGroupSize: number;
  availabilitySlotIds: ReadonlySet<number>;
}

/** courseId -> enrolled students, in a stable enumeration order */
export type CourseRosters = Map<number, RosterStudent[]>;

/** courseId -> groups of student ids, in formation order */
export type MatchingResult = Map<number, number[][]>;

/**
 * GroupFormationConfig defines the scoring and sizing parameters of the engine.
 */
export interface GroupFormationConfig {
  baseScore: number; // = 5, same-course baseline
  minGroupSize: number; // = 2
  maxGroupSize: number; // = 5
  defaultGroupSize: number; // = 3, used when no preference can be derived
}

/** Supplies every course's roster. */
export interface RosterProvider {
  loadRosters(): Promise<CourseRosters>;
}

/** Receives formed groups for persistence. */
export interface ResultSink {
  /** Removes every stored group and membership, for every course. */
  clearAllGroups(): Promise<void>;
  /** Persists one group and its memberships; returns the new group id. */
  writeGroup(
    courseId: number,
    groupIndex: number,
    memberIds: number[],
  ): Promise<number>;
}

/**
 * A ResultSink whose writes are staged in one transaction: committed when
 * `work` resolves, rolled back when it rejects.
 */
export interface TransactionalResultSink {
  transaction<T>(work: (sink: ResultSink) => Promise<T>): Promise<T>;
}

export interface MatchingSummary {
  courses: number;
  groups: number;
  students: number;
  durationMs: number;
}

export interface GroupMemberView {
  id: number;
  name: string;
  email: string;
}

export interface GroupView {
  groupId: number;
  courseId: number;
  courseCode: string;
  courseName: string;
  groupIndex: number;
  members: GroupMemberView[];
}
