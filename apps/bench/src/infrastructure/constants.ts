/** Yellowstone pings carry no id; replies use this one. */
export const GEYSER_PING_ID = 1;

export const SLOT_FILTER_NAME = 'race';

export const GRPC_MAX_RECEIVE_MESSAGE_BYTES = 64 * 1024 * 1024;

export const NANOS_PER_MICRO = 1_000;
export const NANOS_PER_MILLI = 1_000_000;
