// Infrastructure
export type { LoggerPort, LogLevel } from './infrastructure/logger.port';
export { createPinoLogger, isLogLevel, PinoLogger, type LoggerConfig } from './infrastructure/pino-logger';

// Ports
export type { EpochClock } from './ports/clock.port';

// Types
export type { RaceSnapshot, SlotRaceRecord, StreamMetrics } from './types/race';

// Value Objects
export { MAX_U64, Slot } from './value-objects/slot.vo';
export { StreamIdentity } from './value-objects/stream-identity.vo';

// Services
export { MonotonicEpochClock } from './services/monotonic-epoch-clock';
export { RaceLedger } from './services/race-ledger';
export { Referee, type RefereeOptions } from './services/referee.service';
export { mean, median, TAIL_PERCENT, tailPercentile } from './services/race-statistics';
export { DEFAULT_BACKOFF_POLICY, ExponentialBackoff, type BackoffPolicy } from './services/exponential-backoff';

// Utils
export { RetryExhaustedError, toError } from './utils/errors';
