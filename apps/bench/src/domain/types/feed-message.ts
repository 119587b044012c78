import type { Slot } from '@race/domain';

export interface SlotMessage {
  kind: 'slot';
  slot: Slot;
  parent: bigint | null;
  status: string;
}

export interface PingMessage {
  kind: 'ping';
  id: number;
}

export interface PongMessage {
  kind: 'pong';
  id: number;
}

export interface AccountMessage {
  kind: 'account';
  slot: Slot;
  pubkey: string;
  lamports: bigint;
}

export interface TransactionMessage {
  kind: 'transaction';
  slot: Slot;
  signature: string | null;
  accountCount: number;
  instructionCount: number;
  /** `null` when the update carried no status meta. */
  failed: boolean | null;
  computeUnits: bigint | null;
}

export interface BlockMessage {
  kind: 'block';
  slot: Slot;
  blockhash: string;
}

export interface UnknownMessage {
  kind: 'unknown';
  label: string;
}

export interface MalformedMessage {
  kind: 'malformed';
  reason: string;
}

export type PassthroughMessage = AccountMessage | TransactionMessage | BlockMessage;

export type FeedMessage =
  | SlotMessage
  | PingMessage
  | PongMessage
  | PassthroughMessage
  | UnknownMessage
  | MalformedMessage;
