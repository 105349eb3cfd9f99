import { DEFAULT_GROUP_FORMATION_CONFIG } from '../constants/matching.constants';
import { GroupFormationConfig, RosterStudent } from '../types/matching.types';

type SizeBounds = Pick<
  GroupFormationConfig,
  'minGroupSize' | 'maxGroupSize' | 'defaultGroupSize'
>;

/**
 * Brings a stored or submitted group-size preference into range.
 * Missing and non-numeric values fall back to the default size.
 */
export function clampGroupSize(
  value: number | null | undefined,
  bounds: SizeBounds = DEFAULT_GROUP_FORMATION_CONFIG,
): number {
  if (value === null || value === undefined || !Number.isFinite(value)) {
    return bounds.defaultGroupSize;
  }
  return Math.max(
    bounds.minGroupSize,
    Math.min(bounds.maxGroupSize, Math.trunc(value)),
  );
}

/**
 * Target group size for a roster: the median of the clamped preferences,
 * truncated to an integer and clamped again.
 */
export function resolveTargetSize(
  students: readonly RosterStudent[],
  bounds: SizeBounds = DEFAULT_GROUP_FORMATION_CONFIG,
): number {
  if (students.length === 0) return bounds.defaultGroupSize;

  const prefs = students
    .map((s) => clampGroupSize(s.preferredGroupSize, bounds))
    .sort((a, b) => a - b);

  const mid = Math.floor(prefs.length / 2);
  const median =
    prefs.length % 2 === 1 ? prefs[mid] : (prefs[mid - 1] + prefs[mid]) / 2;

  return clampGroupSize(median, bounds);
}
