import type { FeedMessage } from '@race/bench/domain/types/feed-message';
import { GEYSER_PING_ID } from '@race/bench/infrastructure/constants';
import { Slot, toError } from '@race/domain';
import { PublicKey } from '@solana/web3.js';
import bs58 from 'bs58';

/**
 * The parts of a Yellowstone `SubscribeUpdate` the benchmark reads. The generated
 * message type is structurally assignable to it.
 */
export interface GeyserUpdate {
  slot?: { slot: string; parent?: string; status: number };
  ping?: object;
  pong?: { id: number };
  account?: {
    slot: string;
    account?: { pubkey: Uint8Array; lamports: string };
  };
  transaction?: {
    slot: string;
    transaction?: {
      signature: Uint8Array;
      transaction?: { message?: { accountKeys: readonly unknown[]; instructions: readonly unknown[] } };
      meta?: { err?: unknown; computeUnitsConsumed?: string };
    };
  };
  block?: { slot: string; blockhash: string };
  blockMeta?: object;
  transactionStatus?: object;
  entry?: object;
}

// Index = Yellowstone slot status code.
const SLOT_STATUS_NAMES = [
  'processed',
  'confirmed',
  'finalized',
  'first_shred_received',
  'completed',
  'created_bank',
  'dead',
] as const;

const UNHANDLED_KINDS = ['blockMeta', 'transactionStatus', 'entry'] as const;

export function decodeGeyserUpdate(update: GeyserUpdate): FeedMessage {
  try {
    return decode(update);
  } catch (error) {
    return { kind: 'malformed', reason: toError(error).message };
  }
}

function decode(update: GeyserUpdate): FeedMessage {
  if (update.slot) {
    return {
      kind: 'slot',
      slot: Slot.fromWire(update.slot.slot),
      parent: update.slot.parent === undefined ? null : Slot.fromWire(update.slot.parent).value,
      status: slotStatusName(update.slot.status),
    };
  }

  if (update.ping) {
    return { kind: 'ping', id: GEYSER_PING_ID };
  }

  if (update.pong) {
    return { kind: 'pong', id: update.pong.id };
  }

  if (update.account) {
    const info = update.account.account;
    if (!info) {
      return { kind: 'malformed', reason: 'account update without account info' };
    }
    return {
      kind: 'account',
      slot: Slot.fromWire(update.account.slot),
      pubkey: new PublicKey(info.pubkey).toBase58(),
      lamports: BigInt(info.lamports),
    };
  }

  if (update.transaction) {
    const info = update.transaction.transaction;
    if (!info) {
      return { kind: 'malformed', reason: 'transaction update without transaction info' };
    }
    const message = info.transaction?.message;
    const meta = info.meta;
    return {
      kind: 'transaction',
      slot: Slot.fromWire(update.transaction.slot),
      signature: info.signature.length > 0 ? bs58.encode(info.signature) : null,
      accountCount: message?.accountKeys.length ?? 0,
      instructionCount: message?.instructions.length ?? 0,
      failed: meta ? meta.err !== undefined && meta.err !== null : null,
      computeUnits: meta?.computeUnitsConsumed === undefined ? null : BigInt(meta.computeUnitsConsumed),
    };
  }

  if (update.block) {
    return {
      kind: 'block',
      slot: Slot.fromWire(update.block.slot),
      blockhash: update.block.blockhash,
    };
  }

  const label = UNHANDLED_KINDS.find((kind) => update[kind] !== undefined);
  if (label) {
    return { kind: 'unknown', label };
  }

  return { kind: 'malformed', reason: 'update carried no payload' };
}

function slotStatusName(status: number): string {
  return SLOT_STATUS_NAMES[status] ?? `status-${status}`;
}
