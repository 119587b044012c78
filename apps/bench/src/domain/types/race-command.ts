import type { RaceSnapshot, Slot, StreamIdentity } from '@race/domain';

export interface SlotReportCommand {
  type: 'slot-report';
  slot: Slot;
  stream: StreamIdentity;
  /** Nanoseconds since the shared epoch, taken before the update was decoded. */
  timestamp: bigint;
}

export interface SnapshotCommand {
  type: 'snapshot';
  reply: (snapshot: RaceSnapshot) => void;
}

export type RaceCommand = SlotReportCommand | SnapshotCommand;
