/** Base error class for all TrackLink errors */
export class TrackLinkError extends Error {
	readonly code: string;
	override readonly cause?: Error;

	constructor(message: string, code: string, cause?: Error) {
		super(message);
		this.name = this.constructor.name;
		this.code = code;
		this.cause = cause;
	}
}

/** A required setting is missing or malformed */
export class ConfigurationError extends TrackLinkError {
	/** Setting keys that failed validation. */
	readonly keys: ReadonlyArray<string>;

	constructor(message: string, keys: ReadonlyArray<string> = [], cause?: Error) {
		super(message, "CONFIGURATION", cause);
		this.keys = keys;
	}
}

/** Sync job store operation failure */
export class JobStoreError extends TrackLinkError {
	constructor(message: string, cause?: Error) {
		super(message, "JOB_STORE_ERROR", cause);
	}
}

/** Host persistence rejected the write-back of a created external key */
export class LocalCommitError extends TrackLinkError {
	constructor(message: string, cause?: Error) {
		super(message, "LOCAL_COMMIT_FAILED", cause);
	}
}

/** A bounded call did not settle in time */
export class TimeoutError extends TrackLinkError {
	/** The limit that was exceeded, in milliseconds. */
	readonly timeoutMs: number;

	constructor(operation: string, timeoutMs: number) {
		super(`${operation} timed out after ${timeoutMs}ms`, "TIMEOUT");
		this.timeoutMs = timeoutMs;
	}
}

/** Coerce an unknown thrown value into an Error instance. */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
