import { NetworkError, errorMessage } from "../core/errors.js";
import type { RetryConfig } from "../types/config.js";

/** Thrown by a request function for failures worth another attempt. */
export class TransientError extends Error {
  constructor(
    message: string,
    readonly status: number | null = null,
  ) {
    super(message);
    this.name = "TransientError";
  }
}

export type RetryHooks = {
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (attempt: number, delayMs: number, error: TransientError) => void;
  random?: () => number;
};

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/** Delay before retry number `attempt` (1-based): exponential, capped, with up to 10% jitter. */
export function backoffDelay(attempt: number, policy: RetryConfig, random: () => number = Math.random): number {
  const backoff = Math.min(policy.base_delay_ms * Math.pow(2, attempt - 1), policy.max_delay_ms);
  return Math.round(backoff + random() * backoff * 0.1);
}

/**
 * Run `fn` until it succeeds, fails with a non-transient error, or the attempt
 * budget runs out. An exhausted budget surfaces as NetworkError.
 */
export async function withRetry<T>(label: string, policy: RetryConfig, fn: () => Promise<T>, hooks: RetryHooks = {}): Promise<T> {
  const sleep = hooks.sleep ?? defaultSleep;
  const attempts = Math.max(1, policy.attempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (e: unknown) {
      if (!(e instanceof TransientError)) throw e;
      if (attempt >= attempts) {
        throw new NetworkError(`${label} failed after ${attempt} attempts: ${errorMessage(e)}`, attempt, e.status);
      }
      const delay = backoffDelay(attempt, policy, hooks.random);
      hooks.onRetry?.(attempt, delay, e);
      await sleep(delay);
    }
  }
}
