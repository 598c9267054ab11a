import { Err, JobStoreError, Ok, type Result, TrackLinkError, toError } from "@tracklink/core";

/** Error code for operator actions on individual jobs */
export type JobStateErrorCode = "NOT_FOUND" | "INVALID_STATE" | "CONFLICT";

/** An operator action found the job missing, in the wrong state, or changed underneath it */
export class JobStateError extends TrackLinkError {
	override readonly code: JobStateErrorCode;

	constructor(message: string, code: JobStateErrorCode, cause?: Error) {
		super(message, code, cause);
		this.code = code;
	}
}

/** Execute an async store operation and wrap thrown driver errors into a JobStoreError Result. */
export async function wrapStore<T>(
	operation: () => Promise<T>,
	errorMessage: string,
): Promise<Result<T, JobStoreError>> {
	try {
		return Ok(await operation());
	} catch (error) {
		if (error instanceof JobStoreError) return Err(error);
		return Err(new JobStoreError(errorMessage, toError(error)));
	}
}

/** Synchronous counterpart of {@link wrapStore} for drivers such as better-sqlite3. */
export function wrapStoreSync<T>(operation: () => T, errorMessage: string): Result<T, JobStoreError> {
	try {
		return Ok(operation());
	} catch (error) {
		if (error instanceof JobStoreError) return Err(error);
		return Err(new JobStoreError(errorMessage, toError(error)));
	}
}
