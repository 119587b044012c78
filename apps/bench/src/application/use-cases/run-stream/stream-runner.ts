import { sleep as defaultSleep, type SleepFn } from '@race/bench/application/orchestrator/sleep.utils';
import type { PassthroughUpdateLogger } from '@race/bench/application/use-cases/log-updates/passthrough-logger';
import type { FeedConnection, FeedTransport } from '@race/bench/domain/services/ports/feed-transport.port';
import type { FeedMessage } from '@race/bench/domain/types/feed-message';
import type { RaceCommand } from '@race/bench/domain/types/race-command';
import type { EventChannel } from '@race/bench/infrastructure/adapters/channel/event-channel';
import { createChildLogger } from '@race/bench/infrastructure/logging/pino-logger';
import type { CommitmentName } from '@race/config';
import {
  type EpochClock,
  type ExponentialBackoff,
  type LoggerPort,
  RetryExhaustedError,
  type StreamIdentity,
  toError,
} from '@race/domain';

export type StreamRunnerState = 'disconnected' | 'connecting' | 'subscribed' | 'consuming';

export interface StreamRunnerOptions<TRaw> {
  stream: StreamIdentity;
  accessToken?: string;
  commitment: CommitmentName;
  transport: FeedTransport<TRaw>;
  clock: EpochClock;
  events: EventChannel<RaceCommand>;
  backoff: ExponentialBackoff;
  passthrough: PassthroughUpdateLogger;
  sleep?: SleepFn;
  logger?: LoggerPort;
}

type DispatchOutcome = 'continue' | 'exit';

const log = createChildLogger('stream-runner');

/**
 * Keeps one feed subscribed and forwards its slot sightings to the referee.
 *
 * Every session end (transport error, stream end, malformed update) leads to a reconnect
 * after the next backoff delay, until `stop()` or until a bounded policy runs out.
 */
export class StreamRunner<TRaw> {
  private currentState: StreamRunnerState = 'disconnected';
  private stopRequested = false;
  private connection: FeedConnection<TRaw> | null = null;
  private readonly abort = new AbortController();
  private readonly sleep: SleepFn;
  private readonly log: LoggerPort;

  constructor(private readonly options: StreamRunnerOptions<TRaw>) {
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.logger ?? log;
  }

  get stream(): StreamIdentity {
    return this.options.stream;
  }

  get state(): StreamRunnerState {
    return this.currentState;
  }

  async run(): Promise<void> {
    const { stream, backoff } = this.options;
    this.log.info(`${stream.name}: runner started (${stream.endpoint})`);

    while (!this.stopRequested) {
      const delivered = await this.runSession();
      if (this.stopRequested) {
        break;
      }

      if (delivered) {
        backoff.reset();
      }

      const delay = backoff.next();
      if (delay === null) {
        throw new RetryExhaustedError(
          `${stream.name}: giving up after ${backoff.attempts} reconnect attempt(s)`,
          backoff.attempts,
        );
      }

      this.log.warn(`${stream.name}: reconnecting in ${delay}ms (attempt ${backoff.attempts})`);
      await this.sleep(delay, this.abort.signal);
    }

    this.currentState = 'disconnected';
    this.log.info(`${stream.name}: runner stopped`);
  }

  stop(): void {
    if (this.stopRequested) {
      return;
    }
    this.stopRequested = true;
    this.abort.abort();
    this.connection?.close();
  }

  /** Returns true when the session delivered at least one slot. */
  private async runSession(): Promise<boolean> {
    const { stream, accessToken, commitment, transport, clock } = this.options;
    let delivered = false;
    this.currentState = 'connecting';

    try {
      const connection = await transport.connect({ stream, accessToken }, commitment);
      this.connection = connection;
      if (this.stopRequested) {
        return false;
      }

      this.currentState = 'subscribed';
      this.log.info(`${stream.name}: subscribed to slot updates (${commitment})`);

      this.currentState = 'consuming';
      for await (const raw of connection.updates) {
        const timestamp = clock.elapsedNanos();
        const message = connection.decode(raw);
        if (message.kind === 'slot') {
          delivered = true;
        }
        if ((await this.dispatch(message, timestamp, connection)) === 'exit') {
          break;
        }
      }

      if (!this.stopRequested) {
        this.log.warn(`${stream.name}: stream ended`);
      }
    } catch (error) {
      if (!this.stopRequested) {
        this.log.error(`${stream.name}: stream failed`, toError(error), { endpoint: stream.endpoint });
      }
    } finally {
      this.connection?.close();
      this.connection = null;
      this.currentState = 'disconnected';
    }

    return delivered;
  }

  private async dispatch(
    message: FeedMessage,
    timestamp: bigint,
    connection: FeedConnection<TRaw>,
  ): Promise<DispatchOutcome> {
    const { stream, events, passthrough } = this.options;

    switch (message.kind) {
      case 'slot':
        if (!events.send({ type: 'slot-report', slot: message.slot, stream, timestamp })) {
          this.log.debug(`${stream.name}: referee closed, dropping slot ${message.slot.value}`);
        }
        this.log.debug(`${stream.name}: slot ${message.slot.value}`, {
          slot: message.slot.value.toString(),
          parent: message.parent?.toString() ?? null,
          status: message.status,
          receivedAtNs: timestamp.toString(),
        });
        return 'continue';
      case 'ping':
        await connection.sendPing(message.id);
        this.log.trace(`${stream.name}: answered ping ${message.id}`);
        return 'continue';
      case 'pong':
        this.log.debug(`${stream.name}: pong ${message.id}`);
        return 'continue';
      case 'account':
      case 'transaction':
      case 'block':
        passthrough.handle(stream, message);
        return 'continue';
      case 'unknown':
        this.log.warn(`${stream.name}: ignoring unsupported update kind "${message.label}"`);
        return 'continue';
      case 'malformed':
        this.log.error(`${stream.name}: malformed update, restarting session: ${message.reason}`);
        return 'exit';
    }
  }
}
