import type { CommitmentName } from '@race/config';
import { SLOT_FILTER_NAME } from '@race/bench/infrastructure/constants';
import { CommitmentLevel, SubscribeRequest } from '@triton-one/yellowstone-grpc';

const COMMITMENT_LEVELS: Record<CommitmentName, CommitmentLevel> = {
  processed: CommitmentLevel.PROCESSED,
  confirmed: CommitmentLevel.CONFIRMED,
  finalized: CommitmentLevel.FINALIZED,
};

export function toCommitmentLevel(commitment: CommitmentName): CommitmentLevel {
  return COMMITMENT_LEVELS[commitment];
}

/** Slot notifications only, filtered server-side by the requested commitment. */
export function buildSlotSubscription(commitment: CommitmentName): SubscribeRequest {
  return SubscribeRequest.fromPartial({
    slots: { [SLOT_FILTER_NAME]: { filterByCommitment: true } },
    commitment: toCommitmentLevel(commitment),
  });
}

export function buildPingReply(id: number): SubscribeRequest {
  return SubscribeRequest.fromPartial({ ping: { id } });
}
