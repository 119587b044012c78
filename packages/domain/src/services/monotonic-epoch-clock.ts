import type { EpochClock } from '../ports/clock.port';

export class MonotonicEpochClock implements EpochClock {
  private readonly origin: bigint;

  constructor(private readonly now: () => bigint = () => process.hrtime.bigint()) {
    this.origin = now();
  }

  elapsedNanos(): bigint {
    return this.now() - this.origin;
  }
}
