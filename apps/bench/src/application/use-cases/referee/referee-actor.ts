import { EventEmitter } from 'node:events';
import type { RaceCommand } from '@race/bench/domain/types/race-command';
import type { EventChannel } from '@race/bench/infrastructure/adapters/channel/event-channel';
import { createChildLogger } from '@race/bench/infrastructure/logging/pino-logger';
import type { RaceSnapshot, Referee } from '@race/domain';

type RefereeActorEvents = 'halt';

export interface RefereeActorPort {
  run(): Promise<void>;
  requestSnapshot(): Promise<RaceSnapshot>;
  on(event: RefereeActorEvents, callback: (snapshot: RaceSnapshot) => void): this;
}

const log = createChildLogger('referee-actor');

/**
 * Sole owner of the referee. Commands are applied one at a time in channel order, so a
 * snapshot reflects every report enqueued before it.
 */
export class RefereeActor extends EventEmitter implements RefereeActorPort {
  private halted = false;

  constructor(
    private readonly referee: Referee,
    private readonly events: EventChannel<RaceCommand>,
  ) {
    super();
  }

  async run(): Promise<void> {
    log.debug('Referee actor started');
    for await (const command of this.events) {
      this.handle(command);
    }
    log.debug(`Referee actor stopped after ${this.referee.length} slot(s)`);
  }

  requestSnapshot(): Promise<RaceSnapshot> {
    return new Promise<RaceSnapshot>((resolve, reject) => {
      if (!this.events.send({ type: 'snapshot', reply: resolve })) {
        reject(new Error('Referee actor is not running'));
      }
    });
  }

  private handle(command: RaceCommand): void {
    switch (command.type) {
      case 'slot-report': {
        const accepted = this.referee.report(command.slot, command.stream, command.timestamp);
        if (!accepted && this.referee.isComplete() && !this.halted) {
          this.halted = true;
          log.info(`Slot capacity reached, slot ${command.slot.value} from ${command.stream.name} not admitted`);
          this.emit('halt', this.referee.snapshot());
        }
        break;
      }
      case 'snapshot':
        command.reply(this.referee.snapshot());
        break;
    }
  }
}
