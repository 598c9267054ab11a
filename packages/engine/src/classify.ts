import { ExternalCallError, LocalCommitError, type TrackLinkError } from "@tracklink/core";

/** Where in the job flow a failure happened. */
export type FailureStage = "configuration" | "external_call" | "local_commit" | "store";

/** A failed attempt, reduced to what the retry decision needs. */
export interface SyncFailure {
	kind: "transient" | "permanent";
	stage: FailureStage;
	code: string;
	message: string;
	/** Minimum delay the remote side asked for, if any. */
	retryAfterMs: number | null;
}

/**
 * Classify an error raised while processing a job.
 *
 * Only an external error its connector marked non-retryable is permanent.
 * Timeouts, configuration gaps, host write-back and store failures all
 * retry, since each can clear up without the job changing.
 */
export function classifyFailure(error: TrackLinkError, stage: FailureStage): SyncFailure {
	if (error instanceof ExternalCallError) {
		return {
			kind: error.retryable ? "transient" : "permanent",
			stage,
			code: error.code,
			message: error.message,
			retryAfterMs: error.retryAfterMs,
		};
	}
	return {
		kind: "transient",
		stage: error instanceof LocalCommitError ? "local_commit" : stage,
		code: error.code,
		message: error.message,
		retryAfterMs: null,
	};
}

/** One-line form stored in `lastError` and written to failure notes. */
export function describeFailure(failure: SyncFailure): string {
	return `[${failure.code}] ${failure.message}`;
}
