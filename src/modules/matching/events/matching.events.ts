import { Injectable } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { EVENTS } from '@/events/events.constant';
import { LoggerService } from '@/shared/logger/logger.service';
import { StudentSavedEvent } from '@/modules/students/events/student-saved.event';
import { GroupsService } from '../services/groups.service';
import {
  MatchingCompletedEvent,
  MatchingFailedEvent,
} from './matching-completed.event';

@Injectable()
export class MatchingEvents {
  constructor(
    private readonly groups: GroupsService,
    private readonly logger: LoggerService,
  ) {}

  @OnEvent(EVENTS.MATCHING_COMPLETED)
  async handleMatchingCompleted(event: MatchingCompletedEvent) {
    await this.groups.invalidate();
    this.logger.debug(
      `Group listing cache invalidated after ${event.summary.groups} groups were written`,
      MatchingEvents.name,
    );
  }

  @OnEvent(EVENTS.STUDENT_SAVED)
  async handleStudentSaved(event: StudentSavedEvent) {
    await this.groups.invalidate();
    this.logger.debug(
      `Group listing cache invalidated after student ${event.studentId} changed`,
      MatchingEvents.name,
    );
  }

  @OnEvent(EVENTS.MATCHING_FAILED)
  handleMatchingFailed(event: MatchingFailedEvent) {
    this.logger.warn(
      `Matching run failed, previous groups kept: ${event.error instanceof Error ? event.error.message : String(event.error)}`,
      MatchingEvents.name,
    );
  }
}
