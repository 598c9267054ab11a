import { Err, LocalCommitError, type Logger, Ok, type Result, toError } from "@tracklink/core";
import type { HostPersistence } from "./host-persistence";

/** Audit note written alongside the external key. */
export function creationNote(externalKey: string): string {
	return `External issue created: ${externalKey}`;
}

/**
 * Writes sync results back to the host's domain objects.
 *
 * The key and its audit note go through one host call, so the object
 * never shows one without the other.
 */
export class StateWriter {
	constructor(
		private readonly host: HostPersistence,
		private readonly logger: Logger,
	) {}

	/** Record `externalKey` on the object together with the creation note. */
	async commit(objectId: string, externalKey: string): Promise<Result<void, LocalCommitError>> {
		try {
			await this.host.setExternalKeyAndNote(objectId, externalKey, creationNote(externalKey));
			return Ok(undefined);
		} catch (error) {
			const cause = toError(error);
			return Err(
				new LocalCommitError(`Failed to record ${externalKey} on ${objectId}: ${cause.message}`, cause),
			);
		}
	}

	/** The key the host currently shows for the object, `null` when empty. */
	async currentExternalKey(objectId: string): Promise<Result<string | null, LocalCommitError>> {
		try {
			const key = await this.host.getExternalKey(objectId);
			return Ok(key === null || key.trim() === "" ? null : key);
		} catch (error) {
			const cause = toError(error);
			return Err(new LocalCommitError(`Failed to read external key of ${objectId}: ${cause.message}`, cause));
		}
	}

	/** Append a failure note. Never throws; a failed write is only logged. */
	async annotateFailure(objectId: string, text: string): Promise<void> {
		try {
			await this.host.appendNote(objectId, text);
		} catch (error) {
			this.logger.warn("failed to append failure note", {
				objectId,
				error: toError(error).message,
			});
		}
	}
}
