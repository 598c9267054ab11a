import { type JobStoreError, Ok, type Result, type SyncJob } from "@tracklink/core";
import {
	applyJobPatch,
	createPendingJob,
	DEFAULT_LIST_LIMIT,
	emptyStateCounts,
	isEligible,
	type JobListFilter,
	type JobPatch,
	type JobStateCounts,
	type NewSyncJob,
	type SyncJobStore,
} from "./job-store";

/**
 * In-memory job store.
 * Suitable for testing and single-process embedding; nothing survives a restart.
 *
 * Each method checks and writes without awaiting in between, which is what
 * makes `insertIfAbsent` and `transition` atomic on the single JS thread.
 */
export class MemorySyncJobStore implements SyncJobStore {
	private readonly jobs: Map<string, SyncJob> = new Map();

	async insertIfAbsent(input: NewSyncJob): Promise<Result<SyncJob | null, JobStoreError>> {
		if (this.jobs.has(input.objectId)) return Ok(null);
		const job = createPendingJob(input);
		this.jobs.set(job.objectId, job);
		return Ok(copy(job));
	}

	async get(objectId: string): Promise<Result<SyncJob | null, JobStoreError>> {
		const job = this.jobs.get(objectId);
		return Ok(job ? copy(job) : null);
	}

	async list(filter: JobListFilter = {}): Promise<Result<SyncJob[], JobStoreError>> {
		const rows = [...this.jobs.values()]
			.filter((j) => filter.state === undefined || j.state === filter.state)
			.sort((a, b) => b.updatedAt - a.updatedAt)
			.slice(0, filter.limit ?? DEFAULT_LIST_LIMIT);
		return Ok(rows.map(copy));
	}

	async listEligible(
		now: number,
		staleBefore: number,
		limit: number,
	): Promise<Result<SyncJob[], JobStoreError>> {
		const rows = [...this.jobs.values()]
			.filter((j) => isEligible(j, now, staleBefore))
			.sort((a, b) => a.nextEligibleAt - b.nextEligibleAt || a.createdAt - b.createdAt)
			.slice(0, limit);
		return Ok(rows.map(copy));
	}

	async transition(
		objectId: string,
		expectedVersion: number,
		patch: JobPatch,
	): Promise<Result<SyncJob | null, JobStoreError>> {
		const current = this.jobs.get(objectId);
		if (!current || current.version !== expectedVersion) return Ok(null);
		const next = applyJobPatch(current, patch);
		this.jobs.set(objectId, next);
		return Ok(copy(next));
	}

	async countByState(): Promise<Result<JobStateCounts, JobStoreError>> {
		const counts = emptyStateCounts();
		for (const job of this.jobs.values()) {
			counts[job.state]++;
		}
		return Ok(counts);
	}

	async close(): Promise<void> {
		this.jobs.clear();
	}
}

/** Callers get snapshots, never the stored objects. */
function copy(job: SyncJob): SyncJob {
	return { ...job, subject: { ...job.subject } };
}
