import { ConfigurationError, Err, Ok, type Result } from "@tracklink/core";

/** Engine tuning. Every field is optional; see {@link DEFAULT_ENGINE_OPTIONS}. */
export interface EngineOptions {
	/** Failed attempts after which a job becomes Failed-Terminal. */
	maxAttempts?: number;
	/** Delay after the first failure. */
	baseDelayMs?: number;
	/** Ceiling for a single retry delay, including one asked for by the tracker. */
	maxDelayMs?: number;
	/** Time since the claim after which a failing job stops retrying. */
	maxRetryWindowMs?: number;
	/** Age of an In-Flight lease after which another worker may take the job over. Must exceed `3 × callTimeoutMs`. */
	processingTimeoutMs?: number;
	/** Deadline for each host read, tracker call and host write-back. */
	callTimeoutMs?: number;
	pollIntervalMs?: number;
	/** Workers in a pool. */
	concurrency?: number;
	/** Jobs a worker acquires per poll. */
	batchSize?: number;
	/** Let a new trigger re-claim a Failed-Terminal job. */
	reclaimTerminal?: boolean;
	/** Extra tracker fields sent with every issue, keyed by field id. */
	extraFields?: Readonly<Record<string, unknown>>;
}

export type ResolvedEngineOptions = Readonly<Required<EngineOptions>>;

export const DEFAULT_ENGINE_OPTIONS: ResolvedEngineOptions = {
	maxAttempts: 5,
	baseDelayMs: 1_000,
	maxDelayMs: 300_000,
	maxRetryWindowMs: 24 * 60 * 60 * 1_000,
	processingTimeoutMs: 5 * 60 * 1_000,
	callTimeoutMs: 30_000,
	pollIntervalMs: 5_000,
	concurrency: 1,
	batchSize: 10,
	reclaimTerminal: false,
	extraFields: {},
};

const POSITIVE_INTEGERS = ["maxAttempts", "concurrency", "batchSize"] as const;
const DURATIONS = [
	"baseDelayMs",
	"maxDelayMs",
	"maxRetryWindowMs",
	"processingTimeoutMs",
	"callTimeoutMs",
	"pollIntervalMs",
] as const;

/** Fill in defaults and reject values the worker cannot run with. */
export function resolveEngineOptions(
	options: EngineOptions = {},
): Result<ResolvedEngineOptions, ConfigurationError> {
	const resolved = { ...DEFAULT_ENGINE_OPTIONS, ...stripUndefined(options) };
	const problems: string[] = [];
	const keys: string[] = [];

	for (const key of POSITIVE_INTEGERS) {
		if (!Number.isInteger(resolved[key]) || resolved[key] < 1) {
			problems.push(`${key} must be a positive integer`);
			keys.push(key);
		}
	}
	for (const key of DURATIONS) {
		if (!Number.isFinite(resolved[key]) || resolved[key] < 0) {
			problems.push(`${key} must be a non-negative number of milliseconds`);
			keys.push(key);
		}
	}
	if (resolved.maxDelayMs < resolved.baseDelayMs) {
		problems.push("maxDelayMs must not be below baseDelayMs");
		keys.push("maxDelayMs");
	}
	// An attempt makes up to three bounded calls (host read, tracker, host
	// write-back). A lease that can go stale sooner lets a second worker
	// create the issue again.
	if (resolved.processingTimeoutMs <= 3 * resolved.callTimeoutMs) {
		problems.push("processingTimeoutMs must exceed three times callTimeoutMs");
		keys.push("processingTimeoutMs");
	}

	if (problems.length > 0) {
		return Err(new ConfigurationError(`Invalid engine options: ${problems.join("; ")}`, keys));
	}
	return Ok(Object.freeze(resolved));
}

function stripUndefined(options: EngineOptions): EngineOptions {
	return Object.fromEntries(Object.entries(options).filter(([, v]) => v !== undefined));
}
