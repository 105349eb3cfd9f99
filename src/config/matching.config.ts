import { registerAs } from '@nestjs/config';

export interface MatchingConfig {
  baseScore: number;
  /** Re-run matching on this interval; 0 disables the scheduler */
  intervalMs: number;
}

/** What the run scheduler reads; the score lives in the group formation config */
export type MatchingSchedulerConfig = Pick<MatchingConfig, 'intervalMs'>;

export const matchingConfig = registerAs(
  'matching',
  (): MatchingConfig => ({
    baseScore: parseInt(process.env.MATCHING_BASE_SCORE || '5', 10),
    intervalMs: parseInt(process.env.MATCHING_INTERVAL_MS || '0', 10),
  }),
);
