import { Err, type JobStoreError, Ok, type Result, type SyncJob } from "@tracklink/core";
import { JobStateError } from "./errors";
import { resetToPendingPatch } from "./idempotency-guard";
import type { SyncJobStore } from "./job-store";

/**
 * Move a Failed-Terminal job back to Pending with its attempts cleared.
 *
 * Only an operator calls this. A job in any other state, or one that
 * changes between the read and the swap, is left alone.
 */
export async function requeueTerminalJob(
	store: SyncJobStore,
	objectId: string,
	now: number,
): Promise<Result<SyncJob, JobStateError | JobStoreError>> {
	const existing = await store.get(objectId);
	if (!existing.ok) return existing;
	const job = existing.value;
	if (!job) return Err(new JobStateError(`No sync job for ${objectId}`, "NOT_FOUND"));
	if (job.state !== "failed_terminal") {
		return Err(new JobStateError(`Job ${objectId} is ${job.state}, not failed_terminal`, "INVALID_STATE"));
	}

	const reset = await store.transition(objectId, job.version, resetToPendingPatch(now));
	if (!reset.ok) return reset;
	if (!reset.value) {
		return Err(new JobStateError(`Job ${objectId} changed while re-queueing`, "CONFLICT"));
	}
	return Ok(reset.value);
}
