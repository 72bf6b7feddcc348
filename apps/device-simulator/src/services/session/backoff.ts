export interface BackoffPolicy {
  readonly baseMs: number;
  readonly capMs: number;
  readonly maxAttempts: number;
}

/** 1 s doubling to a 60 s ceiling, ten attempts. */
export const DEFAULT_BACKOFF: BackoffPolicy = {
  baseMs: 1_000,
  capMs: 60_000,
  maxAttempts: 10,
};

/** Delay before retry number `attempt` (1-based): base·2^(attempt-1), capped. */
export function backoffDelay(policy: BackoffPolicy, attempt: number): number {
  const exp = Math.max(0, attempt - 1);
  return Math.min(policy.capMs, policy.baseMs * 2 ** exp);
}
