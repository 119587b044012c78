import type { PassthroughMessage } from '@race/bench/domain/types/feed-message';
import { createChildLogger } from '@race/bench/infrastructure/logging/pino-logger';
import type { StreamIdentity } from '@race/domain';
import { LAMPORTS_PER_SOL } from '@solana/web3.js';

const log = createChildLogger('updates');

/**
 * Logs non-slot updates at debug level. Never feeds the race.
 */
export class PassthroughUpdateLogger {
  handle(stream: StreamIdentity, message: PassthroughMessage): void {
    log.debug(`${stream.name}: ${describeUpdate(message)}`);
  }
}

export function describeUpdate(message: PassthroughMessage): string {
  switch (message.kind) {
    case 'account':
      return `account ${message.pubkey} @ slot ${message.slot.value}, balance ${formatSol(message.lamports)} SOL`;
    case 'transaction': {
      const status = message.failed === null ? 'unknown' : message.failed ? 'failed' : 'ok';
      const units = message.computeUnits === null ? 'n/a' : `${message.computeUnits} CU`;
      return (
        `tx ${message.signature ?? '<no signature>'} @ slot ${message.slot.value}, ` +
        `${message.accountCount} accounts, ${message.instructionCount} instructions, status ${status}, ${units}`
      );
    }
    case 'block':
      return `block ${message.blockhash} @ slot ${message.slot.value}`;
  }
}

function formatSol(lamports: bigint): string {
  return (Number(lamports) / LAMPORTS_PER_SOL).toFixed(9);
}
