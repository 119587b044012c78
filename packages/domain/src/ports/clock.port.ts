/**
 * Shared reference instant for every stream. Timestamps from different streams are only
 * comparable when they come from the same instance.
 */
export interface EpochClock {
  elapsedNanos(): bigint;
}
