import type { LoggerPort } from '../infrastructure/logger.port';
import type { RaceSnapshot, SlotRaceRecord, StreamMetrics } from '../types/race';
import type { Slot } from '../value-objects/slot.vo';
import type { StreamIdentity } from '../value-objects/stream-identity.vo';
import { RaceLedger } from './race-ledger';
import { mean, median, TAIL_PERCENT, tailPercentile } from './race-statistics';

export interface RefereeOptions {
  maxSlots: number;
  stopAtMax: boolean;
  /** Configured streams. A record is complete once all of them reported; defaults to every stream seen so far. */
  streams?: readonly StreamIdentity[];
  logger: LoggerPort;
}

interface StreamTally {
  wins: number;
  behindNs: number[];
  winMarginsNs: number[];
}

const NANOS_PER_MS = 1_000_000;

/**
 * Decides per-slot winners and derives cross-stream latency statistics.
 *
 * Not safe for concurrent use: it is owned by a single consumer that feeds it events in
 * arrival order. The first report for a slot wins regardless of the timestamps that follow.
 */
export class Referee {
  private readonly ledger = new RaceLedger();
  private readonly identities = new Map<number, StreamIdentity>();
  private readonly configuredStreamIds: ReadonlySet<number> | null;
  private readonly maxSlots: number;
  private readonly stopAtMax: boolean;
  private readonly log: LoggerPort;

  constructor(options: RefereeOptions) {
    if (!Number.isInteger(options.maxSlots) || options.maxSlots < 1) {
      throw new Error(`maxSlots must be a positive integer, got ${options.maxSlots}`);
    }
    this.maxSlots = options.maxSlots;
    this.stopAtMax = options.stopAtMax;
    this.log = options.logger;
    this.configuredStreamIds = options.streams ? new Set(options.streams.map((stream) => stream.id)) : null;
    for (const stream of options.streams ?? []) {
      this.identities.set(stream.id, stream);
    }
  }

  get length(): number {
    return this.ledger.length;
  }

  /**
   * Records that `stream` saw `slot` at `timestamp` (ns since the shared epoch).
   * Returns false only when the ledger is frozen at capacity and the slot is new.
   */
  report(slot: Slot, stream: StreamIdentity, timestamp: bigint): boolean {
    const existing = this.ledger.get(slot.value);

    if (!existing && this.stopAtMax && this.ledger.length >= this.maxSlots) {
      return false;
    }

    this.identities.set(stream.id, stream);

    if (!existing) {
      this.ledger.append({
        slot,
        winner: stream,
        winnerTimestamp: timestamp,
        finishes: new Map([[stream.id, timestamp]]),
      });
      this.log.info(`Slot ${slot.value} first received by ${stream.name} at ${formatMs(timestamp)}`, {
        slot: slot.value.toString(),
        stream: stream.name,
        position: 1,
        elapsedNs: timestamp.toString(),
      });

      if (!this.stopAtMax && this.ledger.length > this.maxSlots) {
        this.ledger.evictOldest();
      }
      return true;
    }

    existing.finishes.set(stream.id, timestamp);
    const position = [...existing.finishes.keys()].indexOf(stream.id) + 1;
    const behind = behindWinner(timestamp, existing.winnerTimestamp);
    this.log.info(
      `Slot ${slot.value}: ${stream.name} finished #${position} at ${formatMs(timestamp)}, ${formatMs(behind)} behind ${existing.winner.name}`,
      {
        slot: slot.value.toString(),
        stream: stream.name,
        position,
        elapsedNs: timestamp.toString(),
        behindNs: behind.toString(),
        winner: existing.winner.name,
      },
    );
    return true;
  }

  isComplete(): boolean {
    return this.stopAtMax && this.ledger.length >= this.maxSlots;
  }

  snapshotMetrics(): StreamMetrics[] {
    const tallies = new Map<number, StreamTally>();

    for (const record of this.ledger.values()) {
      const runnerUpBehind = runnerUpBehindNs(record);

      for (const [streamId, finishedAt] of record.finishes) {
        let tally = tallies.get(streamId);
        if (!tally) {
          tally = { wins: 0, behindNs: [], winMarginsNs: [] };
          tallies.set(streamId, tally);
        }
        tally.behindNs.push(Number(behindWinner(finishedAt, record.winnerTimestamp)));
        if (record.winner.id === streamId) {
          tally.wins += 1;
          if (runnerUpBehind !== null) {
            tally.winMarginsNs.push(runnerUpBehind);
          }
        }
      }
    }

    const metrics: StreamMetrics[] = [];
    for (const [streamId, stream] of this.identities) {
      const tally = tallies.get(streamId);
      if (!tally || tally.behindNs.length === 0) {
        continue;
      }
      const participation = tally.behindNs.length;
      metrics.push({
        stream,
        wins: tally.wins,
        participation,
        winRate: (tally.wins / participation) * 100,
        medianBehindNs: median(tally.behindNs) ?? 0,
        p90BehindNs: tailPercentile(tally.behindNs, TAIL_PERCENT.p90) ?? 0,
        p95BehindNs: tailPercentile(tally.behindNs, TAIL_PERCENT.p95) ?? 0,
        p99BehindNs: tailPercentile(tally.behindNs, TAIL_PERCENT.p99) ?? 0,
        averageWinMarginNs: mean(tally.winMarginsNs),
      });
    }

    // Ties keep first-observed order.
    return metrics.sort((a, b) => a.medianBehindNs - b.medianBehindNs);
  }

  snapshot(): RaceSnapshot {
    const expected = this.configuredStreamIds ?? new Set(this.identities.keys());
    let completeRaces = 0;
    for (const record of this.ledger.values()) {
      if ([...expected].every((streamId) => record.finishes.has(streamId))) {
        completeRaces += 1;
      }
    }

    return {
      totalSlots: this.ledger.length,
      completeRaces,
      partialRaces: this.ledger.length - completeRaces,
      metrics: this.snapshotMetrics(),
      isComplete: this.isComplete(),
    };
  }

  /** Copies of the ledger in first-sighting order. */
  records(): SlotRaceRecord[] {
    return [...this.ledger.values()].map((record) => ({ ...record, finishes: new Map(record.finishes) }));
  }

  getRecord(slot: Slot): SlotRaceRecord | undefined {
    const record = this.ledger.get(slot.value);
    return record ? { ...record, finishes: new Map(record.finishes) } : undefined;
  }
}

function behindWinner(timestamp: bigint, winnerTimestamp: bigint): bigint {
  return timestamp > winnerTimestamp ? timestamp - winnerTimestamp : 0n;
}

function runnerUpBehindNs(record: SlotRaceRecord): number | null {
  let best: bigint | null = null;
  for (const [streamId, finishedAt] of record.finishes) {
    if (streamId === record.winner.id) {
      continue;
    }
    const behind = behindWinner(finishedAt, record.winnerTimestamp);
    if (best === null || behind < best) {
      best = behind;
    }
  }
  return best === null ? null : Number(best);
}

function formatMs(nanos: bigint): string {
  return `${(Number(nanos) / NANOS_PER_MS).toFixed(3)}ms`;
}
