import { MatchingSummary } from '../types/matching.types';

export class MatchingCompletedEvent {
  constructor(public readonly summary: MatchingSummary) {}
}

export class MatchingFailedEvent {
  constructor(public readonly error: unknown) {}
}
