import { DEFAULT_GROUP_FORMATION_CONFIG } from '../constants/matching.constants';
import { RosterStudent } from '../types/matching.types';

/**
 * Scores how well two students of the same course fit together.
 *
 * - base points for sharing the course
 * - +1 per timeslot both are available in
 * - a penalty of (diff - 1) once preferred group sizes differ by 2 or more
 *
 * Never negative; symmetric in its arguments.
 */
export function compatibility(
  a: RosterStudent,
  b: RosterStudent,
  baseScore = DEFAULT_GROUP_FORMATION_CONFIG.baseScore,
): number {
  let overlap = 0;
  for (const slotId of a.availabilitySlotIds) {
    if (b.availabilitySlotIds.has(slotId)) overlap++;
  }

  const sizeDiff = Math.abs(a.preferredGroupSize - b.preferredGroupSize);
  const penalty = sizeDiff >= 2 ? sizeDiff - 1 : 0;

  return Math.max(0, baseScore + overlap - penalty);
}

/**
 * Pairwise scores for one roster, addressed by position in that roster.
 */
export class CompatibilityMatrix {
  private readonly scores: number[][];

  constructor(students: readonly RosterStudent[], baseScore?: number) {
    const n = students.length;
    this.scores = Array.from({ length: n }, () => new Array<number>(n).fill(0));

    for (let i = 0; i < n; i++) {
      for (let j = i + 1; j < n; j++) {
        const score = compatibility(students[i], students[j], baseScore);
        this.scores[i][j] = score;
        this.scores[j][i] = score;
      }
    }
  }

  get size(): number {
    return this.scores.length;
  }

  get(i: number, j: number): number {
    return this.scores[i][j];
  }

  /** Mean score of `candidate` against `members`; 0 for an empty list. */
  average(candidate: number, members: readonly number[]): number {
    if (members.length === 0) return 0;
    let total = 0;
    for (const member of members) total += this.scores[candidate][member];
    return total / members.length;
  }
}
