export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  if (typeof value === 'object' && value !== null) {
    try {
      return new Error(JSON.stringify(value));
    } catch {
      return new Error(String(value));
    }
  }
  return new Error(String(value));
}

/** Raised only when a retry policy has a finite `maxAttempts` and all of them failed. */
export class RetryExhaustedError extends Error {
  constructor(
    message: string,
    readonly attempts: number,
  ) {
    super(message);
    this.name = 'RetryExhaustedError';
  }
}
