import type { SleepFn } from '@race/bench/application/orchestrator/sleep.utils';
import { PassthroughUpdateLogger } from '@race/bench/application/use-cases/log-updates/passthrough-logger';
import { RefereeActor } from '@race/bench/application/use-cases/referee/referee-actor';
import { RaceReporter } from '@race/bench/application/use-cases/report-race/race-reporter';
import { StreamRunner } from '@race/bench/application/use-cases/run-stream/stream-runner';
import type { FeedTransport } from '@race/bench/domain/services/ports/feed-transport.port';
import type { RaceCommand } from '@race/bench/domain/types/race-command';
import { EventChannel } from '@race/bench/infrastructure/adapters/channel/event-channel';
import { YellowstoneTransport } from '@race/bench/infrastructure/adapters/geyser/yellowstone-transport.adapter';
import { createChildLogger } from '@race/bench/infrastructure/logging/pino-logger';
import type { ConfigSchema } from '@race/config';
import {
  type EpochClock,
  ExponentialBackoff,
  MonotonicEpochClock,
  Referee,
  StreamIdentity,
} from '@race/domain';
import { Container } from './container';

export interface BenchRegistry {
  BenchConfig: ConfigSchema;
  EpochClock: EpochClock;
  RaceEvents: EventChannel<RaceCommand>;
  StreamIdentities: StreamIdentity[];
  Referee: Referee;
  RefereeActor: RefereeActor;
  FeedTransport: FeedTransport<unknown>;
  PassthroughUpdateLogger: PassthroughUpdateLogger;
  StreamRunners: StreamRunner<unknown>[];
  RaceReporter: RaceReporter;
}

/** Test seams: anything given here replaces the production binding. */
export interface RegistryOverrides {
  clock?: EpochClock;
  transport?: FeedTransport<unknown>;
  sleep?: SleepFn;
}

export function IoCmoduleRegistry(
  benchConfig: ConfigSchema,
  overrides: RegistryOverrides = {},
): Container<BenchRegistry> {
  const container = new Container<BenchRegistry>();

  container.registerInstance('BenchConfig', benchConfig);

  // One epoch for every runner, so timestamps are comparable across streams
  container.registerInstance('EpochClock', overrides.clock ?? new MonotonicEpochClock());

  container.registerInstance('RaceEvents', new EventChannel<RaceCommand>());

  container.register('StreamIdentities', () =>
    benchConfig.streams.map((stream) => StreamIdentity.create(stream.id, stream.name, stream.endpoint)),
  );

  // Referee + its actor
  container.register(
    'Referee',
    () =>
      new Referee({
        maxSlots: benchConfig.race.maxSlots,
        stopAtMax: benchConfig.race.stopAtMax,
        streams: container.resolve('StreamIdentities'),
        logger: createChildLogger('referee'),
      }),
  );

  container.register('RefereeActor', () => new RefereeActor(container.resolve('Referee'), container.resolve('RaceEvents')));

  // Feed transport
  container.register('FeedTransport', () => overrides.transport ?? new YellowstoneTransport());

  container.registerInstance('PassthroughUpdateLogger', new PassthroughUpdateLogger());

  // One runner per configured stream, each with its own backoff state
  container.register('StreamRunners', () => {
    const identities = container.resolve('StreamIdentities');
    return benchConfig.streams.flatMap((stream) => {
      const identity = identities.find((candidate) => candidate.id === stream.id);
      if (!identity) {
        return [];
      }
      return [
        new StreamRunner<unknown>({
          stream: identity,
          accessToken: stream.accessToken,
          commitment: benchConfig.race.commitment,
          transport: container.resolve('FeedTransport'),
          clock: container.resolve('EpochClock'),
          events: container.resolve('RaceEvents'),
          backoff: new ExponentialBackoff(benchConfig.retry),
          passthrough: container.resolve('PassthroughUpdateLogger'),
          sleep: overrides.sleep,
        }),
      ];
    });
  });

  // Periodic reporter; reads state only through the actor
  container.register('RaceReporter', () => {
    const actor = container.resolve('RefereeActor');
    return new RaceReporter({
      intervalMs: benchConfig.reporter.summaryIntervalMs,
      requestSnapshot: () => actor.requestSnapshot(),
    });
  });

  return container;
}
