import type { RetryPolicyConfig } from "@hookloop/kernel";

export type RetryPolicy = RetryPolicyConfig;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  initialDelayMs: 1000,
  multiplier: 2,
  maxDelayMs: 30_000,
};

export const DEFAULT_MAX_RETRIES = 5;

/**
 * Delay before retry number `retries + 1`:
 * `initialDelayMs * multiplier^retries`, capped at `maxDelayMs`.
 */
export function backoffDelay(policy: RetryPolicy, retries: number): number {
  const delay = policy.initialDelayMs * Math.pow(policy.multiplier, retries);
  return Math.min(Math.round(delay), policy.maxDelayMs);
}
