import type { Slot } from '../value-objects/slot.vo';
import type { StreamIdentity } from '../value-objects/stream-identity.vo';

export interface SlotRaceRecord {
  readonly slot: Slot;
  readonly winner: StreamIdentity;
  /** Nanoseconds since the shared epoch. Fixed when the record is created. */
  readonly winnerTimestamp: bigint;
  /** Stream id -> arrival timestamp (ns since epoch). */
  readonly finishes: Map<number, bigint>;
}

export interface StreamMetrics {
  readonly stream: StreamIdentity;
  readonly wins: number;
  readonly participation: number;
  /** Percentage, 0-100. */
  readonly winRate: number;
  readonly medianBehindNs: number;
  readonly p90BehindNs: number;
  readonly p95BehindNs: number;
  readonly p99BehindNs: number;
  /** Mean lead over the runner-up in won races that had at least two finishers. */
  readonly averageWinMarginNs: number | null;
}

export interface RaceSnapshot {
  readonly totalSlots: number;
  readonly completeRaces: number;
  readonly partialRaces: number;
  readonly metrics: readonly StreamMetrics[];
  readonly isComplete: boolean;
}
