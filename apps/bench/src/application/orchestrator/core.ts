import { createChildLogger } from '@race/bench/infrastructure/logging/pino-logger';
import { type RaceSnapshot, toError } from '@race/domain';
import { RaceBench, type RaceBenchOverrides } from './race-bench';

const log = createChildLogger('core');

export class Core extends RaceBench {
  private isRunning = false;
  private tasks: Promise<void>[] = [];
  private resolveCompletion: ((snapshot: RaceSnapshot) => void) | null = null;

  constructor(overrides: RaceBenchOverrides = {}) {
    super(overrides);
  }

  /**
   * Starts the referee, one runner per stream and the reporter. Resolves with the snapshot
   * that ended the race: capacity reached in stop-at-max mode, or `stop()`.
   */
  start(): Promise<RaceSnapshot> {
    if (this.isRunning) {
      return Promise.reject(new Error('Race bench already running'));
    }
    this.isRunning = true;
    this.logConfiguration();

    const completion = new Promise<RaceSnapshot>((resolve) => {
      this.resolveCompletion = resolve;
    });

    const actor = this.getRefereeActor();
    const reporter = this.getReporter();
    actor.on('halt', (snapshot) => this.complete(snapshot, 'referee reached capacity'));
    reporter.on('complete', (snapshot) => this.complete(snapshot, 'reporter saw a complete race'));

    this.tasks.push(
      actor.run().catch((error) => {
        log.error('Referee actor failed', toError(error));
      }),
    );

    for (const runner of this.getStreamRunners()) {
      this.tasks.push(
        runner.run().catch((error) => {
          log.error(`${runner.stream.name}: runner exited`, toError(error));
        }),
      );
    }

    reporter.start();
    log.info('Race started');

    return completion;
  }

  async stop(): Promise<RaceSnapshot | null> {
    if (!this.isRunning) return null;
    this.isRunning = false;

    log.info('Stopping race bench...');

    this.getReporter().stop();
    const snapshot = await this.getRefereeActor().requestSnapshot();

    for (const runner of this.getStreamRunners()) {
      runner.stop();
    }
    this.getEvents().close();

    await Promise.all(this.tasks);
    this.tasks = [];

    this.complete(snapshot, 'stopped');
    log.info('Race bench stopped');
    return snapshot;
  }

  private complete(snapshot: RaceSnapshot, reason: string): void {
    const resolve = this.resolveCompletion;
    if (!resolve) return;

    this.resolveCompletion = null;
    log.info(`Race finished (${reason}) after ${snapshot.totalSlots} slot(s)`);
    resolve(snapshot);
  }

  private logConfiguration(): void {
    const { race, streams } = this.config;

    log.info(`Racing ${streams.length} stream(s): ${streams.map((stream) => stream.name).join(', ')}`);
    for (const stream of streams) {
      log.info(`  [${stream.id}] ${stream.name} -> ${stream.endpoint}${stream.accessToken ? ' (token)' : ''}`);
    }
    log.info(
      `Max slots: ${race.maxSlots} (${race.stopAtMax ? 'stop at max' : 'rolling window'}), ` +
        `commitment: ${race.commitment}, warmup slots: ${race.warmupSlots}`,
    );

    if (race.warmupSlots > 0) {
      log.warn(`warmupSlots=${race.warmupSlots} is recorded only; every observed slot counts toward statistics`);
    }
  }
}
