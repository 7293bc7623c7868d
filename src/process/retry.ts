import { setTimeout as delay } from "node:timers/promises";

export interface RetryPolicy {
  attempts: number;
  delayMs: number;
}

export type SleepFn = (ms: number) => Promise<void>;

export interface WithRetryOptions {
  sleep?: SleepFn;
  signal?: AbortSignal;
  onRetry?: (error: unknown, attempt: number, nextAttempt: number) => void;
}

export const defaultRetryPolicy: RetryPolicy = {
  attempts: 1,
  delayMs: 0
};

export function resolveRetryPolicy(policy: Partial<RetryPolicy> = {}): RetryPolicy {
  const attempts = policy.attempts ?? defaultRetryPolicy.attempts;
  const delayMs = policy.delayMs ?? defaultRetryPolicy.delayMs;

  if (!Number.isInteger(attempts) || attempts < 1) {
    throw new Error("Retry attempts must be an integer greater than or equal to 1.");
  }

  if (!Number.isFinite(delayMs) || delayMs < 0) {
    throw new Error("Retry delay must be a non-negative number of milliseconds.");
  }

  return { attempts, delayMs };
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: WithRetryOptions = {}
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= policy.attempts || options.signal?.aborted) {
        throw error;
      }

      options.onRetry?.(error, attempt, attempt + 1);
      if (policy.delayMs > 0) {
        await sleep(policy.delayMs);
      }
    }
  }
}

async function defaultSleep(ms: number): Promise<void> {
  await delay(ms);
}
