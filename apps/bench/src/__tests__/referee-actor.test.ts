import { RefereeActor } from '@race/bench/application/use-cases/referee/referee-actor';
import type { RaceCommand } from '@race/bench/domain/types/race-command';
import { EventChannel } from '@race/bench/infrastructure/adapters/channel/event-channel';
import { type RaceSnapshot, Referee, Slot, StreamIdentity } from '@race/domain';
import { describe, expect, it, vi } from 'vitest';
import { createTestLogger } from './fakes';

const ALPHA = StreamIdentity.create(0, 'alpha', 'https://alpha.example.com');
const BETA = StreamIdentity.create(1, 'beta', 'https://beta.example.com');

function report(slot: number, stream: StreamIdentity, timestamp: bigint): RaceCommand {
  return { type: 'slot-report', slot: Slot.create(BigInt(slot)), stream, timestamp };
}

function setup(maxSlots: number, stopAtMax: boolean) {
  const events = new EventChannel<RaceCommand>();
  const referee = new Referee({ maxSlots, stopAtMax, streams: [ALPHA, BETA], logger: createTestLogger() });
  const actor = new RefereeActor(referee, events);
  return { events, actor, running: actor.run() };
}

describe('RefereeActor', () => {
  it('answers snapshots after every report queued before them', async () => {
    const { events, actor, running } = setup(10, false);

    events.send(report(100, ALPHA, 1_000n));
    events.send(report(100, BETA, 3_000n));
    events.send(report(101, BETA, 5_000n));
    const snapshot = await actor.requestSnapshot();

    expect(snapshot.totalSlots).toBe(2);
    expect(snapshot.completeRaces).toBe(1);
    expect(snapshot.partialRaces).toBe(1);
    expect(snapshot.metrics.map((metrics) => [metrics.stream.name, metrics.wins])).toEqual([
      ['alpha', 1],
      ['beta', 1],
    ]);

    events.close();
    await running;
  });

  it('emits halt once when a full frozen ledger turns a slot away', async () => {
    const { events, actor, running } = setup(2, true);
    const onHalt = vi.fn<(snapshot: RaceSnapshot) => void>();
    actor.on('halt', onHalt);

    events.send(report(1, ALPHA, 10n));
    events.send(report(2, ALPHA, 20n));
    events.send(report(1, BETA, 15n));
    events.send(report(3, ALPHA, 30n));
    events.send(report(4, BETA, 40n));
    const snapshot = await actor.requestSnapshot();

    expect(onHalt).toHaveBeenCalledTimes(1);
    expect(onHalt.mock.calls[0]?.[0]).toMatchObject({ totalSlots: 2, completeRaces: 1, isComplete: true });
    expect(snapshot.totalSlots).toBe(2);

    events.close();
    await running;
  });

  it('rejects snapshot requests once the channel is closed', async () => {
    const { events, actor, running } = setup(5, false);
    events.close();
    await running;

    await expect(actor.requestSnapshot()).rejects.toThrow('Referee actor is not running');
  });
});
