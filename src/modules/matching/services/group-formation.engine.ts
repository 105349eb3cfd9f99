import { LoggerService } from '@/shared/logger/logger.service';
import { CompatibilityMatrix } from './compatibility';
import { resolveTargetSize } from './target-size';
import { GroupFormationConfig, RosterStudent } from '../types/matching.types';

export class GroupFormationEngine {
  constructor(
    private readonly config: GroupFormationConfig,
    private readonly logger: LoggerService,
  ) {}

  /**
   * Core algorithm: splits one course's roster into study groups.
   *
   * Seeds each group with the unassigned student most compatible with the
   * rest of the pool, then grows it one member at a time by best average
   * compatibility until the target size is reached. A trailing singleton is
   * folded into the group it fits best.
   *
   * Every tie goes to the student (or group) that comes first in roster
   * (or formation) order, so the same roster always yields the same groups.
   *
   * @returns groups in formation order, members in the order they joined
   */
  formGroups<T extends RosterStudent>(students: readonly T[]): T[][] {
    if (students.length === 0) return [];
    // a lone student keeps its own group, there is nothing to merge into
    if (students.length === 1) return [[students[0]]];

    const targetSize = resolveTargetSize(students, this.config);
    const matrix = new CompatibilityMatrix(students, this.config.baseScore);

    // roster positions, always kept in roster order
    let unassigned = students.map((_, index) => index);
    const groups: number[][] = [];

    while (unassigned.length > 0) {
      const seed = this.pickSeed(unassigned, matrix);
      unassigned = unassigned.filter((index) => index !== seed);

      const group = [seed];
      while (group.length < targetSize && unassigned.length > 0) {
        const next = this.pickCandidate(unassigned, group, matrix);
        unassigned = unassigned.filter((index) => index !== next);
        group.push(next);
      }

      groups.push(group);
    }

    this.mergeLeftover(groups, matrix);

    this.logger.debug(
      `Formed ${groups.length} group(s) from ${students.length} students | target=${targetSize}`,
      GroupFormationEngine.name,
    );

    return groups.map((group) => group.map((index) => students[index]));
  }

  /** Unassigned student with the highest total score against the rest of the pool. */
  private pickSeed(unassigned: number[], matrix: CompatibilityMatrix): number {
    let best = unassigned[0];
    let bestTotal = -1;

    for (const candidate of unassigned) {
      let total = 0;
      for (const other of unassigned) {
        if (other !== candidate) total += matrix.get(candidate, other);
      }
      if (total > bestTotal) {
        bestTotal = total;
        best = candidate;
      }
    }

    return best;
  }

  /**
   * Unassigned student with the highest average score against the group.
   * Scores are never negative, so someone is always picked.
   */
  private pickCandidate(
    unassigned: number[],
    group: number[],
    matrix: CompatibilityMatrix,
  ): number {
    let best = unassigned[0];
    let bestAverage = -1;

    for (const candidate of unassigned) {
      const average = matrix.average(candidate, group);
      if (average > bestAverage) {
        bestAverage = average;
        best = candidate;
      }
    }

    return best;
  }

  // only the last group formed can be a leftover
  private mergeLeftover(groups: number[][], matrix: CompatibilityMatrix): void {
    const last = groups[groups.length - 1];
    if (groups.length < 2 || last.length !== 1) return;

    groups.pop();
    const lone = last[0];

    let bestGroup = 0;
    let bestAverage = -1;
    groups.forEach((group, index) => {
      const average = matrix.average(lone, group);
      if (average > bestAverage) {
        bestAverage = average;
        bestGroup = index;
      }
    });

    groups[bestGroup].push(lone);
  }
}
