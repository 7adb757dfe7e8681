import { setTimeout as delay } from "node:timers/promises";
import { RetryExhaustedError } from "../errors.js";

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: boolean;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 4000,
  jitter: true,
};

export type RetryOptions = {
  label: string;
  policy?: Partial<RetryPolicy>;
  isRetryable?: (err: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
};

export function resolveRetryPolicy(partial?: Partial<RetryPolicy>): RetryPolicy {
  return {
    maxAttempts: Math.max(1, Math.floor(partial?.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts)),
    baseDelayMs: Math.max(0, partial?.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs),
    maxDelayMs: Math.max(0, partial?.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs),
    jitter: partial?.jitter ?? DEFAULT_RETRY_POLICY.jitter,
  };
}

/** Delay before retry number `attempt` (1-based). */
export function computeBackoffMs(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random,
): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  if (!policy.jitter) {
    return exponential;
  }
  return Math.round(exponential / 2 + random() * (exponential / 2));
}

const defaultSleep = async (ms: number): Promise<void> => {
  await delay(ms);
};

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const policy = resolveRetryPolicy(opts.policy);
  const sleep = opts.sleep ?? defaultSleep;
  const isRetryable = opts.isRetryable ?? (() => true);
  let lastError: unknown;
  for (let attempt = 1; attempt <= policy.maxAttempts; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (!isRetryable(err)) {
        throw err;
      }
      if (attempt === policy.maxAttempts) {
        break;
      }
      const delayMs = computeBackoffMs(policy, attempt, opts.random);
      opts.onRetry?.({ attempt, delayMs, error: err });
      await sleep(delayMs);
    }
  }
  throw new RetryExhaustedError(opts.label, policy.maxAttempts, lastError);
}
