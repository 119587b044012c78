export interface BackoffPolicy {
  initialDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  /** `null` retries forever. */
  maxAttempts: number | null;
}

export const DEFAULT_BACKOFF_POLICY: BackoffPolicy = {
  initialDelayMs: 500,
  multiplier: 1.5,
  maxDelayMs: 60_000,
  maxAttempts: null,
};

export class ExponentialBackoff {
  private attempt = 0;

  constructor(private readonly policy: BackoffPolicy = DEFAULT_BACKOFF_POLICY) {
    if (policy.initialDelayMs < 0 || policy.maxDelayMs < 0) {
      throw new Error('Backoff delays cannot be negative');
    }
    if (policy.multiplier < 1) {
      throw new Error('Backoff multiplier must be >= 1');
    }
  }

  get attempts(): number {
    return this.attempt;
  }

  /**
   * Delay before the next retry, or `null` once `maxAttempts` retries have been handed out.
   */
  next(): number | null {
    if (this.policy.maxAttempts !== null && this.attempt >= this.policy.maxAttempts) {
      return null;
    }
    const raw = this.policy.initialDelayMs * this.policy.multiplier ** this.attempt;
    this.attempt += 1;
    return Math.round(Math.min(this.policy.maxDelayMs, raw));
  }

  reset(): void {
    this.attempt = 0;
  }
}
