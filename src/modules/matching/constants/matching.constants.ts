import { GroupFormationConfig } from '../types/matching.types';

export const GROUP_FORMATION_CONFIG = 'GROUP_FORMATION_CONFIG';
export const MATCHING_CONFIG = 'MATCHING_CONFIG';
export const ROSTER_PROVIDER = 'ROSTER_PROVIDER';
export const RESULT_SINK = 'RESULT_SINK';

export const DEFAULT_GROUP_FORMATION_CONFIG: GroupFormationConfig = {
  baseScore: 5,
  minGroupSize: 2,
  maxGroupSize: 5,
  defaultGroupSize: 3,
};

export const GROUPS_CACHE_KEY = 'study-groups:latest';
export const GROUPS_CACHE_TTL_SECONDS = 60;
