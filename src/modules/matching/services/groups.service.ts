import { Injectable } from '@nestjs/common';
import { CacheService } from '@/shared/cache/cache.service';
import { StudyGroupRepository } from '../repositories/study-group.repository';
import {
  GROUPS_CACHE_KEY,
  GROUPS_CACHE_TTL_SECONDS,
} from '../constants/matching.constants';
import { GroupView } from '../types/matching.types';

/** Read side for the persisted groups, cached in memory between writes. */
@Injectable()
export class GroupsService {
  // bumped on every invalidation; a read that straddles one is not cached
  private version = 0;

  constructor(
    private readonly studyGroups: StudyGroupRepository,
    private readonly cache: CacheService,
  ) {}

  async listGroups(): Promise<GroupView[]> {
    const cached = await this.cache.getMemory<GroupView[]>(GROUPS_CACHE_KEY);
    if (cached) return cached;

    const version = this.version;
    const groups = await this.studyGroups.findAllWithMembers();
    if (version === this.version) {
      await this.cache.setMemory(GROUPS_CACHE_KEY, groups, GROUPS_CACHE_TTL_SECONDS);
    }
    return groups;
  }

  async invalidate(): Promise<void> {
    this.version++;
    await this.cache.deleteMemory(GROUPS_CACHE_KEY);
  }
}
