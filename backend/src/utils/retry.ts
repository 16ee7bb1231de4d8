/**
 * Backoff retry for calls into external collaborators (sample providers).
 * Errors the predicate rejects are rethrown as-is on the first failure.
 */
import { componentLogger } from "../config/logger";

const log = componentLogger("retry");

export interface RetryOptions {
  /** Label for logs and the final error, e.g. "samples for 0123abcd". */
  label?: string;
  retries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  isRetryable?: (error: unknown) => boolean;
}

export class RetryExhaustedError extends Error {
  constructor(
    readonly label: string,
    readonly attempts: number,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${label} failed after ${attempts} attempts: ${reason}`, { cause });
    this.name = "RetryExhaustedError";
  }
}

export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    label = "operation",
    retries = 3,
    initialDelayMs = 100,
    maxDelayMs = 5000,
    backoffMultiplier = 2,
    isRetryable = () => true
  } = options;

  let delayMs = initialDelayMs;
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!isRetryable(error)) throw error;
      if (attempt > retries) throw new RetryExhaustedError(label, attempt, error);

      log.warn({ label, attempt, retries, delayMs, err: error }, "retrying after failure");
      await sleep(delayMs);
      delayMs = Math.min(delayMs * backoffMultiplier, maxDelayMs);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
