export interface BackoffPolicy {
  initialMs:   number
  maxMs:       number
  factor:      number
  /** Extra random delay as a fraction of the base delay, in [0, 1] */
  jitterRatio: number
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  initialMs:   1000,
  maxMs:       30_000,
  factor:      2,
  jitterRatio: 0.2,
}

/** Delay before reconnect attempt `attempt` (0-based), without jitter. */
export function baseDelay(attempt: number, policy: BackoffPolicy = DEFAULT_BACKOFF): number {
  const n = Math.max(0, Math.floor(attempt))
  return Math.min(policy.initialMs * policy.factor ** n, policy.maxMs)
}

/** Base delay plus jitter, never above `maxMs`. `random` must return values in [0, 1). */
export function backoffDelay(
  attempt: number,
  policy: BackoffPolicy = DEFAULT_BACKOFF,
  random: () => number = Math.random,
): number {
  const base = baseDelay(attempt, policy)
  return Math.min(base + base * policy.jitterRatio * random(), policy.maxMs)
}
