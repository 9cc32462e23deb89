import type { BackoffPolicy } from './types.js';

export const DEFAULT_BACKOFF: BackoffPolicy = { baseMs: 1000, capMs: 60_000, jitter: 0.2 };

/**
 * Delay before restart `attempt` (1-based). Exponential from `baseMs`, jittered,
 * capped at `capMs`, and never shorter than `previousMs` so a restart sequence
 * backs off monotonically even when jitter draws low.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: BackoffPolicy,
  random: () => number,
  previousMs = 0
): number {
  const exponent = Math.max(0, attempt - 1);
  const raw = Math.min(policy.capMs, policy.baseMs * 2 ** exponent);
  const spread = (random() * 2 - 1) * policy.jitter;
  const jittered = Math.round(raw * (1 + spread));
  return Math.min(policy.capMs, Math.max(previousMs, jittered));
}
