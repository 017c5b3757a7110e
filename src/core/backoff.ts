import { BackoffOptions } from './types';

export const DEFAULT_JITTER = 0.2;

/**
 * Delay before a failed job becomes eligible again:
 * `baseMs * 2^attempts`, capped at `maxMs`, then spread by ±jitter.
 *
 * `attempts` is the number of attempts already consumed, so the first retry
 * (attempts = 1) waits roughly 2 × base.
 */
export function computeBackoff(
  attempts: number,
  options: BackoffOptions,
  random: () => number = Math.random
): number {
  const jitter = options.jitter ?? DEFAULT_JITTER;
  const exponential = options.baseMs * Math.pow(2, Math.max(0, attempts));
  const capped = Math.min(exponential, options.maxMs);

  // random() in [0, 1) maps to a factor in [1 - jitter, 1 + jitter)
  const factor = 1 - jitter + random() * 2 * jitter;
  return Math.max(0, Math.round(capped * factor));
}
