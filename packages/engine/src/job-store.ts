import type { JobStoreError, JobSubject, Result, SyncJob, SyncJobState } from "@tracklink/core";

/** Input for claiming a new job. */
export interface NewSyncJob {
	objectId: string;
	subject: JobSubject;
	/** Claim time (ms since epoch); also the first eligible time. */
	now: number;
}

/**
 * Fields a transition may change. `state` and `updatedAt` are always
 * written; omitted fields keep their stored value.
 */
export interface JobPatch {
	state: SyncJobState;
	updatedAt: number;
	attempts?: number;
	nextEligibleAt?: number;
	lastError?: string | null;
	externalKey?: string | null;
	lockedBy?: string | null;
	lockedAt?: number | null;
	subject?: JobSubject;
	claimedAt?: number;
}

/** Filter for {@link SyncJobStore.list}. */
export interface JobListFilter {
	state?: SyncJobState;
	/** Maximum rows returned (default 100). */
	limit?: number;
}

/** Number of jobs per state. */
export type JobStateCounts = Record<SyncJobState, number>;

/**
 * Durable store of sync jobs: the queue and the idempotency record at once.
 *
 * Every write is conditional: `insertIfAbsent` only inserts when no row
 * exists for the object, and `transition` only applies when the stored
 * `version` still equals the caller's. Implementations must make both
 * atomic with respect to concurrent callers, including other processes
 * sharing the same backend.
 */
export interface SyncJobStore {
	/** Insert a Pending job. Returns `null` when a row already exists for the object. */
	insertIfAbsent(job: NewSyncJob): Promise<Result<SyncJob | null, JobStoreError>>;
	/** Look a job up by object id. */
	get(objectId: string): Promise<Result<SyncJob | null, JobStoreError>>;
	/** List jobs, most recently updated first. */
	list(filter?: JobListFilter): Promise<Result<SyncJob[], JobStoreError>>;
	/**
	 * Jobs a worker may acquire: Pending/Failed-Retryable with
	 * `nextEligibleAt <= now`, plus In-Flight jobs whose lease started
	 * before `staleBefore`. Oldest eligible first.
	 */
	listEligible(now: number, staleBefore: number, limit: number): Promise<Result<SyncJob[], JobStoreError>>;
	/**
	 * Compare-and-swap update. Returns the updated job, or `null` when the
	 * stored version no longer matches `expectedVersion`.
	 */
	transition(
		objectId: string,
		expectedVersion: number,
		patch: JobPatch,
	): Promise<Result<SyncJob | null, JobStoreError>>;
	/** Number of jobs in each state. */
	countByState(): Promise<Result<JobStateCounts, JobStoreError>>;
	/** Release resources. */
	close(): Promise<void>;
}

/** Default page size for {@link SyncJobStore.list}. */
export const DEFAULT_LIST_LIMIT = 100;

/** Build the row a successful claim inserts. */
export function createPendingJob(input: NewSyncJob): SyncJob {
	return {
		objectId: input.objectId,
		state: "pending",
		attempts: 0,
		nextEligibleAt: input.now,
		lastError: null,
		externalKey: null,
		lockedBy: null,
		lockedAt: null,
		version: 1,
		subject: { ...input.subject },
		createdAt: input.now,
		claimedAt: input.now,
		updatedAt: input.now,
	};
}

/** Apply a patch to an in-memory job, bumping its version. */
export function applyJobPatch(job: SyncJob, patch: JobPatch): SyncJob {
	return {
		...job,
		state: patch.state,
		updatedAt: patch.updatedAt,
		attempts: patch.attempts ?? job.attempts,
		nextEligibleAt: patch.nextEligibleAt ?? job.nextEligibleAt,
		lastError: patch.lastError !== undefined ? patch.lastError : job.lastError,
		externalKey: patch.externalKey !== undefined ? patch.externalKey : job.externalKey,
		lockedBy: patch.lockedBy !== undefined ? patch.lockedBy : job.lockedBy,
		lockedAt: patch.lockedAt !== undefined ? patch.lockedAt : job.lockedAt,
		subject: patch.subject ? { ...patch.subject } : job.subject,
		claimedAt: patch.claimedAt ?? job.claimedAt,
		version: job.version + 1,
	};
}

/** Whether a job is eligible for acquisition at `now`. */
export function isEligible(job: SyncJob, now: number, staleBefore: number): boolean {
	if (job.state === "pending" || job.state === "failed_retryable") {
		return job.nextEligibleAt <= now;
	}
	return job.state === "in_flight" && job.lockedAt !== null && job.lockedAt < staleBefore;
}

/** Zeroed {@link JobStateCounts}. */
export function emptyStateCounts(): JobStateCounts {
	return { pending: 0, in_flight: 0, succeeded: 0, failed_retryable: 0, failed_terminal: 0 };
}
