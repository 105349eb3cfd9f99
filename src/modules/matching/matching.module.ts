import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { StudentEntity } from '@/database/entities';
import { MatchingSchedulerConfig } from '@/config/matching.config';
import { GroupFormationConfig } from './types/matching.types';
import {
  DEFAULT_GROUP_FORMATION_CONFIG,
  GROUP_FORMATION_CONFIG,
  MATCHING_CONFIG,
  RESULT_SINK,
  ROSTER_PROVIDER,
} from './constants/matching.constants';
import { RosterRepository } from './repositories/roster.repository';
import { StudyGroupRepository } from './repositories/study-group.repository';
import { CourseMatchingOrchestrator } from './services/course-matching.orchestrator';
import { MatchingService } from './services/matching.service';
import { GroupsService } from './services/groups.service';
import { MatchingEvents } from './events/matching.events';
import { MatchingController } from './matching.controller';

@Module({
  imports: [TypeOrmModule.forFeature([StudentEntity])],
  providers: [
    {
      provide: GROUP_FORMATION_CONFIG,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): GroupFormationConfig => ({
        ...DEFAULT_GROUP_FORMATION_CONFIG,
        baseScore: configService.get<number>(
          'matching.baseScore',
          DEFAULT_GROUP_FORMATION_CONFIG.baseScore,
        ),
      }),
    },
    {
      provide: MATCHING_CONFIG,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): MatchingSchedulerConfig => ({
        intervalMs: configService.get<number>('matching.intervalMs', 0),
      }),
    },
    RosterRepository,
    StudyGroupRepository,
    { provide: ROSTER_PROVIDER, useExisting: RosterRepository },
    { provide: RESULT_SINK, useExisting: StudyGroupRepository },
    CourseMatchingOrchestrator,
    MatchingService,
    GroupsService,
    MatchingEvents,
  ],
  controllers: [MatchingController],
  exports: [MatchingService, GroupsService],
})
export class MatchingModule {}
