import type { CommitmentName } from '@race/config';
import type { StreamIdentity } from '@race/domain';
import type { FeedMessage } from '@race/bench/domain/types/feed-message';

export interface FeedDefinition {
  stream: StreamIdentity;
  accessToken?: string;
}

/**
 * One live subscription. `updates` ends when the session ends and throws when it fails.
 */
export interface FeedConnection<TRaw> {
  readonly updates: AsyncIterable<TRaw>;
  decode(raw: TRaw): FeedMessage;
  sendPing(id: number): Promise<void>;
  close(): void;
}

export interface FeedTransport<TRaw> {
  /** Opens the connection and sends the slot subscription request. */
  connect(definition: FeedDefinition, commitment: CommitmentName): Promise<FeedConnection<TRaw>>;
}
