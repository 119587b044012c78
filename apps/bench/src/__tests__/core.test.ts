import { Core } from '@race/bench/application/orchestrator/core';
import type { ConfigSchema } from '@race/config';
import { describe, expect, it } from 'vitest';
import { FakeSession, FakeTransport, type SessionPlan, slotMessage, SteppingClock } from './fakes';

function benchConfig(race: Partial<ConfigSchema['race']> = {}): ConfigSchema {
  return {
    telemetry: { logLevel: 'fatal', traceErrors: false },
    race: { maxSlots: 3, stopAtMax: true, commitment: 'processed', warmupSlots: 0, ...race },
    retry: { initialDelayMs: 500, multiplier: 1.5, maxDelayMs: 60_000, maxAttempts: null },
    reporter: { summaryIntervalMs: 60_000 },
    streams: [
      { id: 0, name: 'alpha', endpoint: 'https://alpha.example.com', accessToken: 'test-secret' },
      { id: 1, name: 'beta', endpoint: 'https://beta.example.com' },
    ],
  };
}

function createCore(config: ConfigSchema, plans: Map<string, SessionPlan[]>, onIdle?: (stream: string) => void) {
  const transport = new FakeTransport(plans, onIdle);
  const core = new Core({ config, transport, clock: new SteppingClock(), sleep: async () => {} });
  return { core, transport };
}

describe('Core', () => {
  it('finishes a stop-at-max race once the ledger turns a slot away', async () => {
    const { core, transport } = createCore(
      benchConfig(),
      new Map([
        ['alpha', [new FakeSession([slotMessage(1), slotMessage(2), slotMessage(3), slotMessage(4)])]],
        ['beta', [new FakeSession([slotMessage(1), slotMessage(2), slotMessage(3)])]],
      ]),
    );

    const final = await core.start();

    expect(final.totalSlots).toBe(3);
    expect(final.isComplete).toBe(true);

    const stopped = await core.stop();
    expect(stopped?.totalSlots).toBe(3);
    expect(transport.connects[0]).toEqual({ stream: 'alpha', accessToken: 'test-secret', commitment: 'processed' });
    expect(transport.idleSessions.every((session) => session.closed)).toBe(true);
  });

  it('resolves start() with the snapshot taken by stop()', async () => {
    let markIdle: () => void = () => {};
    const idleReached = new Promise<void>((resolve) => {
      markIdle = resolve;
    });
    let idleStreams = 0;

    const { core } = createCore(
      benchConfig({ stopAtMax: false, maxSlots: 10 }),
      new Map([
        ['alpha', [new FakeSession([slotMessage(5), slotMessage(6)])]],
        ['beta', [new FakeSession([slotMessage(5)])]],
      ]),
      () => {
        idleStreams += 1;
        if (idleStreams === 2) markIdle();
      },
    );

    const completion = core.start();
    await idleReached;
    const stopped = await core.stop();
    const final = await completion;

    expect(final).toBe(stopped);
    expect(final).toMatchObject({ totalSlots: 2, completeRaces: 1, partialRaces: 1, isComplete: false });
    expect(final.metrics.map((metrics) => metrics.stream.name).sort()).toEqual(['alpha', 'beta']);
  });

  it('refuses to start twice', async () => {
    const { core } = createCore(benchConfig(), new Map());

    const completion = core.start();
    await expect(core.start()).rejects.toThrow('Race bench already running');

    await core.stop();
    await expect(completion).resolves.toMatchObject({ totalSlots: 0 });
    expect(await core.stop()).toBeNull();
  });
});
