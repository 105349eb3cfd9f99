import {
  Inject,
  Injectable,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { EVENTS } from '@/events/events.constant';
import { MatchingInProgressError } from '@/common/errors/matching.errors';
import { LoggerService } from '@/shared/logger/logger.service';
import { MatchingSchedulerConfig } from '@/config/matching.config';
import { CourseMatchingOrchestrator } from './course-matching.orchestrator';
import {
  MatchingCompletedEvent,
  MatchingFailedEvent,
} from '../events/matching-completed.event';
import { MATCHING_CONFIG } from '../constants/matching.constants';
import { MatchingResult, MatchingSummary } from '../types/matching.types';

/**
 * Runs the course matcher one run at a time, on demand or on a timer.
 */
@Injectable()
export class MatchingService implements OnModuleInit, OnModuleDestroy {
  private ticker: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly orchestrator: CourseMatchingOrchestrator,
    private readonly logger: LoggerService,
    private readonly eventEmitter: EventEmitter2,
    @Inject(MATCHING_CONFIG)
    private readonly config: MatchingSchedulerConfig,
  ) {}

  onModuleInit() {
    if (this.config.intervalMs > 0) this.start();
  }
  onModuleDestroy() {
    this.stop();
  }

  start() {
    if (this.ticker) return;
    this.ticker = setInterval(
      () =>
        this.tick().catch((err) => {
          this.logger.error('Matching tick error', err, MatchingService.name);
        }),
      this.config.intervalMs,
    );
    this.logger.debug(
      `MatchingService scheduled every ${this.config.intervalMs}ms`,
      MatchingService.name,
    );
  }

  stop() {
    if (this.ticker) {
      clearInterval(this.ticker);
      this.ticker = null;
      this.logger.debug('MatchingService stopped.', MatchingService.name);
    }
  }

  get isRunning(): boolean {
    return this.running;
  }

  // scheduled runs skip instead of failing when a run is in flight
  async tick(): Promise<void> {
    if (this.running) {
      this.logger.debug(
        'Matching tick skipped, previous run still in progress',
        MatchingService.name,
      );
      return;
    }
    await this.run();
  }

  /**
   * Runs matching for every course.
   * @throws MatchingInProgressError when another run has not finished yet
   */
  async run(): Promise<MatchingResult> {
    if (this.running) throw new MatchingInProgressError();
    this.running = true;

    const startedAt = Date.now();
    try {
      const result = await this.orchestrator.runMatching();
      const summary = this.summarize(result, Date.now() - startedAt);

      await this.eventEmitter.emitAsync(
        EVENTS.MATCHING_COMPLETED,
        new MatchingCompletedEvent(summary),
      );
      this.logger.log(
        `Matching finished: ${summary.groups} groups across ${summary.courses} courses (${summary.students} placements) in ${summary.durationMs}ms`,
        MatchingService.name,
      );

      return result;
    } catch (error) {
      this.eventEmitter.emit(EVENTS.MATCHING_FAILED, new MatchingFailedEvent(error));
      throw error;
    } finally {
      this.running = false;
    }
  }

  private summarize(result: MatchingResult, durationMs: number): MatchingSummary {
    let groups = 0;
    let students = 0;
    for (const courseGroups of result.values()) {
      groups += courseGroups.length;
      for (const members of courseGroups) students += members.length;
    }
    return { courses: result.size, groups, students, durationMs };
  }
}
