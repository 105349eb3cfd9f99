import { Inject, Injectable } from '@nestjs/common';
import { LoggerService } from '@/shared/logger/logger.service';
import { GroupFormationEngine } from './group-formation.engine';
import {
  GROUP_FORMATION_CONFIG,
  RESULT_SINK,
  ROSTER_PROVIDER,
} from '../constants/matching.constants';
import {
  GroupFormationConfig,
  MatchingResult,
  RosterProvider,
  TransactionalResultSink,
} from '../types/matching.types';

@Injectable()
export class CourseMatchingOrchestrator {
  private readonly engine: GroupFormationEngine;

  constructor(
    @Inject(ROSTER_PROVIDER)
    private readonly rosterProvider: RosterProvider,
    @Inject(RESULT_SINK)
    private readonly resultSink: TransactionalResultSink,
    @Inject(GROUP_FORMATION_CONFIG)
    private readonly config: GroupFormationConfig,
    private readonly logger: LoggerService,
  ) {
    this.engine = new GroupFormationEngine(this.config, this.logger);
  }

  /**
   * Forms groups for every course and replaces all stored groups with them.
   *
   * Groups are computed before anything is written. Clearing the old groups
   * and writing the new ones happen in one sink transaction, so a failure
   * leaves the previous groups in place.
   *
   * @returns member ids per course, in course iteration order
   */
  async runMatching(): Promise<MatchingResult> {
    const rosters = await this.rosterProvider.loadRosters();

    const result: MatchingResult = new Map();
    for (const [courseId, roster] of rosters) {
      if (roster.length === 0) continue;
      const groups = this.engine.formGroups(roster);
      result.set(
        courseId,
        groups.map((group) => group.map((student) => student.id)),
      );
    }

    if (result.size === 0) {
      this.logger.debug(
        'No enrolled students, stored groups left untouched',
        CourseMatchingOrchestrator.name,
      );
      return result;
    }

    await this.resultSink.transaction(async (sink) => {
      await sink.clearAllGroups();

      for (const [courseId, groups] of result) {
        for (const [index, memberIds] of groups.entries()) {
          await sink.writeGroup(courseId, index + 1, memberIds);
        }
      }
    });

    return result;
  }
}
