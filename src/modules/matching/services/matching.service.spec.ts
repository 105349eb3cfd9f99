import { EventEmitter2 } from '@nestjs/event-emitter';
import { EVENTS } from '@/events/events.constant';
import {
  MatchingInProgressError,
  StorageUnavailableError,
} from '@/common/errors/matching.errors';
import { LoggerService } from '@/shared/logger/logger.service';
import { CourseMatchingOrchestrator } from './course-matching.orchestrator';
import { MatchingService } from './matching.service';
import { DEFAULT_GROUP_FORMATION_CONFIG } from '../constants/matching.constants';
import {
  MatchingCompletedEvent,
  MatchingFailedEvent,
} from '../events/matching-completed.event';
import {
  InMemoryResultSink,
  InMemoryRosterProvider,
  student,
} from '../testing/in-memory.fakes';

describe('MatchingService', () => {
  let provider: InMemoryRosterProvider;
  let sink: InMemoryResultSink;
  let events: EventEmitter2;
  let logger: LoggerService;

  const createService = (intervalMs = 0) =>
    new MatchingService(
      new CourseMatchingOrchestrator(
        provider,
        sink,
        DEFAULT_GROUP_FORMATION_CONFIG,
        new LoggerService(),
      ),
      logger,
      events,
      { intervalMs },
    );

  beforeEach(() => {
    provider = new InMemoryRosterProvider(
      new Map([
        [1, [student(1), student(2), student(3), student(4)]],
        [2, [student(5)]],
      ]),
    );
    sink = new InMemoryResultSink();
    events = new EventEmitter2();
    logger = new LoggerService();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('runs matching and announces a summary', async () => {
    const completed: MatchingCompletedEvent[] = [];
    events.on(EVENTS.MATCHING_COMPLETED, (event: MatchingCompletedEvent) => {
      completed.push(event);
    });

    const result = await createService().run();

    expect(result.get(1)).toEqual([[1, 2, 3, 4]]);
    expect(result.get(2)).toEqual([[5]]);
    expect(completed).toHaveLength(1);
    expect(completed[0].summary).toMatchObject({
      courses: 2,
      groups: 2,
      students: 5,
    });
  });

  it('rejects a run while another is in flight', async () => {
    let release: () => void = () => undefined;
    sink.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const service = createService();

    const first = service.run();
    expect(service.isRunning).toBe(true);
    await expect(service.run()).rejects.toBeInstanceOf(MatchingInProgressError);

    release();
    await first;
    expect(service.isRunning).toBe(false);
    expect(sink.calls.filter((call) => call === 'clear')).toHaveLength(1);
  });

  it('skips a scheduled tick while a run is in flight', async () => {
    let release: () => void = () => undefined;
    sink.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const service = createService();
    const debug = jest.spyOn(logger, 'debug');

    const first = service.run();
    await service.tick();
    release();
    await first;

    expect(provider.loads).toBe(1);
    expect(debug).toHaveBeenCalledWith(
      'Matching tick skipped, previous run still in progress',
      'MatchingService',
    );
  });

  it('announces failures and allows the next run', async () => {
    const failed: MatchingFailedEvent[] = [];
    events.on(EVENTS.MATCHING_FAILED, (event: MatchingFailedEvent) => {
      failed.push(event);
    });
    sink.failOnWrite = 1;
    const service = createService();

    await expect(service.run()).rejects.toBeInstanceOf(StorageUnavailableError);
    expect(failed).toHaveLength(1);
    expect(failed[0].error).toBeInstanceOf(StorageUnavailableError);
    expect(service.isRunning).toBe(false);

    sink.failOnWrite = null;
    await expect(service.run()).resolves.toBeInstanceOf(Map);
  });

  it('runs on its interval once started', () => {
    jest.useFakeTimers();
    const service = createService(1000);

    service.onModuleInit();
    jest.advanceTimersByTime(1000);
    expect(provider.loads).toBe(1);

    service.onModuleDestroy();
    jest.advanceTimersByTime(5000);
    expect(provider.loads).toBe(1);
  });

  it('does not schedule runs when the interval is zero', () => {
    jest.useFakeTimers();
    const service = createService(0);

    service.onModuleInit();
    jest.advanceTimersByTime(60_000);

    expect(provider.loads).toBe(0);
  });
});
