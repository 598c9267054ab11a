/** Parameters for {@link computeBackoff}. */
export interface BackoffPolicy {
	/** Delay after the first failure. */
	baseDelayMs: number;
	/** Ceiling for any single delay. */
	maxDelayMs: number;
}

/**
 * Exponential backoff: `baseDelayMs * 2^(attempts - 1)`, capped at `maxDelayMs`.
 *
 * `attempts` is the failure count including the one just recorded, so the
 * first retry waits exactly `baseDelayMs`.
 */
export function computeBackoff(attempts: number, policy: BackoffPolicy): number {
	const exponent = Math.max(0, attempts - 1);
	return Math.min(policy.baseDelayMs * 2 ** exponent, policy.maxDelayMs);
}
