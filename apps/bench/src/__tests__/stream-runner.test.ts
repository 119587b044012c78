import { PassthroughUpdateLogger } from '@race/bench/application/use-cases/log-updates/passthrough-logger';
import { StreamRunner } from '@race/bench/application/use-cases/run-stream/stream-runner';
import type { FeedMessage } from '@race/bench/domain/types/feed-message';
import type { RaceCommand } from '@race/bench/domain/types/race-command';
import { EventChannel } from '@race/bench/infrastructure/adapters/channel/event-channel';
import {
  DEFAULT_BACKOFF_POLICY,
  ExponentialBackoff,
  type LoggerPort,
  RetryExhaustedError,
  Slot,
  StreamIdentity,
} from '@race/domain';
import { describe, expect, it } from 'vitest';
import {
  createTestLogger,
  drain,
  FakeSession,
  FakeTransport,
  type SessionPlan,
  slotMessage,
  SteppingClock,
} from './fakes';

const ALPHA = StreamIdentity.create(0, 'alpha', 'https://alpha.example.com');

function setup(plan: SessionPlan[], maxAttempts: number | null = null, logger?: LoggerPort) {
  const events = new EventChannel<RaceCommand>();
  const delays: number[] = [];
  let runner: StreamRunner<FeedMessage> | null = null;
  const transport = new FakeTransport(new Map([['alpha', plan]]), () => runner?.stop());

  runner = new StreamRunner<FeedMessage>({
    stream: ALPHA,
    accessToken: 'test-secret',
    commitment: 'confirmed',
    transport,
    clock: new SteppingClock(1_000n),
    events,
    backoff: new ExponentialBackoff({ ...DEFAULT_BACKOFF_POLICY, maxAttempts }),
    passthrough: new PassthroughUpdateLogger(),
    sleep: async (ms) => {
      delays.push(ms);
    },
    logger,
  });

  return { runner, events, delays, transport };
}

function reported(commands: RaceCommand[]): Array<[bigint, bigint]> {
  return commands.flatMap((command) =>
    command.type === 'slot-report' ? [[command.slot.value, command.timestamp] satisfies [bigint, bigint]] : [],
  );
}

describe('StreamRunner', () => {
  it('timestamps slots, answers pings and ignores the rest', async () => {
    const session = new FakeSession([
      slotMessage(10),
      { kind: 'ping', id: 1 },
      { kind: 'pong', id: 9 },
      { kind: 'account', slot: Slot.create(10n), pubkey: '11111111111111111111111111111111', lamports: 5n },
      { kind: 'unknown', label: 'entry' },
      slotMessage(11),
    ]);
    const { runner, events, delays, transport } = setup([session]);

    await runner.run();

    expect(reported(await drain(events))).toEqual([
      [10n, 1_000n],
      [11n, 6_000n],
    ]);
    expect(session.pings).toEqual([1]);
    expect(delays).toEqual([500]);
    expect(transport.connects[0]).toEqual({ stream: 'alpha', accessToken: 'test-secret', commitment: 'confirmed' });
    expect(runner.state).toBe('disconnected');
  });

  it('logs each slot sighting with parent, status and arrival time', async () => {
    const logger = createTestLogger();
    const { runner } = setup([new FakeSession([slotMessage(10)])], null, logger);

    await runner.run();

    expect(logger.debug).toHaveBeenCalledWith('alpha: slot 10', {
      slot: '10',
      parent: '9',
      status: 'processed',
      receivedAtNs: '1000',
    });
  });

  it('reconnects after a transport error in the middle of a session', async () => {
    const logger = createTestLogger();
    const broken = new FakeSession([slotMessage(5)], false);
    const failure = new Error('RST_STREAM');
    broken.updates.close(failure);
    const { runner, events, delays, transport } = setup([broken, new FakeSession([slotMessage(6)])], null, logger);

    await runner.run();

    expect(reported(await drain(events)).map(([slot]) => slot)).toEqual([5n, 6n]);
    expect(logger.error).toHaveBeenCalledWith('alpha: stream failed', failure, { endpoint: 'https://alpha.example.com' });
    expect(broken.closed).toBe(true);
    expect(transport.connects).toHaveLength(3);
    expect(delays).toEqual([500, 500]);
  });

  it('drops the session on a malformed update and reconnects', async () => {
    const first = new FakeSession([slotMessage(5), { kind: 'malformed', reason: 'update carried no payload' }, slotMessage(6)], false);
    const second = new FakeSession([slotMessage(7)]);
    const { runner, events, transport } = setup([first, second]);

    await runner.run();

    expect(reported(await drain(events)).map(([slot]) => slot)).toEqual([5n, 7n]);
    expect(first.closed).toBe(true);
    expect(transport.connects).toHaveLength(3);
  });

  it('backs off with non-decreasing delays while connects fail', async () => {
    const { runner, delays } = setup([
      new Error('connection refused'),
      new Error('connection refused'),
      new Error('connection refused'),
      new Error('connection refused'),
    ]);

    await runner.run();

    expect(delays).toEqual([500, 750, 1125, 1688]);
  });

  it('resets the backoff after a session that delivered slots', async () => {
    const { runner, delays, events } = setup([
      new Error('unavailable'),
      new Error('unavailable'),
      new FakeSession([slotMessage(1)]),
      new Error('unavailable'),
    ]);

    await runner.run();

    expect(delays).toEqual([500, 750, 500, 750]);
    expect(reported(await drain(events)).map(([slot]) => slot)).toEqual([1n]);
  });

  it('gives up once a bounded policy is exhausted', async () => {
    const { runner, delays } = setup([new Error('denied'), new Error('denied'), new Error('denied')], 2);

    await expect(runner.run()).rejects.toBeInstanceOf(RetryExhaustedError);
    expect(delays).toEqual([500, 750]);
  });

  it('stop() closes the live session and ends the run', async () => {
    const live = new FakeSession([], false);
    const { runner, events } = setup([live]);

    const running = runner.run();
    live.updates.send(slotMessage(42));
    const command = await events.recv();
    expect(command?.type).toBe('slot-report');

    runner.stop();
    await running;

    expect(live.closed).toBe(true);
    expect(runner.state).toBe('disconnected');
  });
});
