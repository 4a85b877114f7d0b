import { isRetryableHellHubError } from "./errors.js";
import { logger } from "./logger.js";

/**
 * Options for configuring retry behavior
 */
export interface RetryOptions {
  /** Retries after the first attempt; 0 disables retrying */
  maxAttempts?: number;

  /** Delay before the first retry */
  initialDelayMs?: number;

  /** Upper bound for any single delay */
  maxDelayMs?: number;

  /** Multiplier applied to the delay after each retry */
  backoffFactor?: number;

  /** Full jitter: wait a random time between 0 and the computed delay */
  jitter?: boolean;

  /** Decides whether a failure is worth another attempt. Defaults to isRetryableHellHubError */
  retryableErrorCheck?: (error: unknown) => boolean;

  /** Called before each retry with the error that caused it */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

type ResolvedRetryOptions = Required<Omit<RetryOptions, "onRetry">> &
  Pick<RetryOptions, "onRetry">;

const DEFAULT_RETRY_OPTIONS: ResolvedRetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 10000,
  backoffFactor: 2,
  jitter: true,
  retryableErrorCheck: isRetryableHellHubError,
};

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Exponential backoff around a single async operation.
 */
export class RetryService {
  private readonly options: ResolvedRetryOptions;

  constructor(options: RetryOptions = {}) {
    this.options = { ...DEFAULT_RETRY_OPTIONS, ...options };
  }

  /**
   * Delay before retry number `retry` (1-based).
   */
  private delayFor(retry: number): number {
    const { initialDelayMs, backoffFactor, maxDelayMs, jitter } = this.options;
    const delay = Math.min(
      initialDelayMs * backoffFactor ** (retry - 1),
      maxDelayMs
    );
    return jitter ? Math.random() * delay : delay;
  }

  /**
   * Runs `fn`, retrying retryable failures until it succeeds or the retries run out.
   * @throws The last error once it is not retryable or no retries are left
   */
  public async execute<T>(fn: () => Promise<T>): Promise<T> {
    const { maxAttempts, retryableErrorCheck, onRetry } = this.options;
    let retry = 0;

    for (;;) {
      try {
        return await fn();
      } catch (error) {
        if (!retryableErrorCheck(error)) {
          logger.debug(`Not retrying: ${String(error)}`);
          throw error;
        }
        if (retry >= maxAttempts) {
          logger.debug(`Giving up after ${retry} retries: ${String(error)}`);
          throw error;
        }

        retry++;
        const delayMs = this.delayFor(retry);
        onRetry?.(error, retry, delayMs);
        logger.debug(
          `Retry ${retry}/${maxAttempts} in ${Math.round(delayMs)}ms`
        );
        await sleep(delayMs);
      }
    }
  }
}
