import { EventEmitter } from 'node:events';
import { createChildLogger } from '@race/bench/infrastructure/logging/pino-logger';
import { type RaceSnapshot, toError } from '@race/domain';
import { formatRaceSummary } from './summary-formatter';

type RaceReporterEvents = 'complete';

export interface RaceReporterPort {
  start(): void;
  stop(): void;
  tick(): Promise<RaceSnapshot>;
  on(event: RaceReporterEvents, callback: (snapshot: RaceSnapshot) => void): this;
}

export interface RaceReporterOptions {
  intervalMs: number;
  requestSnapshot: () => Promise<RaceSnapshot>;
}

const log = createChildLogger('reporter');

export class RaceReporter extends EventEmitter implements RaceReporterPort {
  private timer: NodeJS.Timeout | null = null;
  private completed = false;

  constructor(private readonly options: RaceReporterOptions) {
    super();
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      void this.tick().catch((error) => {
        log.error('Race summary failed', toError(error));
      });
    }, this.options.intervalMs);

    log.debug(`Reporter started (every ${this.options.intervalMs}ms)`);
  }

  stop(): void {
    if (!this.timer) return;

    clearInterval(this.timer);
    this.timer = null;
    log.debug('Reporter stopped');
  }

  /** Logs one summary; emits `complete` the first time the snapshot says the race is over. */
  async tick(): Promise<RaceSnapshot> {
    const snapshot = await this.options.requestSnapshot();

    for (const line of formatRaceSummary(snapshot)) {
      log.info(line);
    }

    if (snapshot.isComplete && !this.completed) {
      this.completed = true;
      this.emit('complete', snapshot);
    }

    return snapshot;
  }
}
