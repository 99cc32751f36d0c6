export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

/**
 * Delay before retry number `attempt` (1-based):
 * min(base * multiplier^(attempt - 1), max).
 */
export function computeBackoffDelay(attempt: number, policy: BackoffPolicy): number {
  if (attempt < 1) return 0;
  const delay = policy.baseDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
