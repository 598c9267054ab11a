// ---------------------------------------------------------------------------
// Domain model shared by the trigger path, the worker and the operator CLI
// ---------------------------------------------------------------------------

/**
 * Snapshot of a tracked work item as the host application saw it.
 *
 * The host owns these objects; TrackLink never mutates them except through
 * the host persistence interface.
 */
export interface DomainObject {
	id: string;
	projectId: string;
	statusId: string;
	title: string;
	description?: string | null;
	/** Key of the external issue created for this object. Empty until synced. */
	externalKey?: string | null;
}

/** A role held by an actor within one project. */
export interface Membership {
	projectId: string;
	roleId: string;
}

/** The user whose save triggered an evaluation. */
export interface Actor {
	id: string;
	memberships: ReadonlyArray<Membership>;
}

/** Lifecycle states of a {@link SyncJob}. */
export const SYNC_JOB_STATES = [
	"pending",
	"in_flight",
	"succeeded",
	"failed_retryable",
	"failed_terminal",
] as const;

/** A single state value from {@link SYNC_JOB_STATES}. */
export type SyncJobState = (typeof SYNC_JOB_STATES)[number];

/** Type guard for raw state strings read back from storage or the CLI. */
export function isSyncJobState(value: unknown): value is SyncJobState {
	return SYNC_JOB_STATES.some((state) => state === value);
}

/** Fields of the domain object captured when the job is claimed. */
export interface JobSubject {
	projectId: string;
	title: string;
	description: string | null;
}

/**
 * Durable record of one synchronisation for one domain object.
 *
 * At most one job exists per object. The row doubles as the idempotency
 * claim, so it is never deleted.
 */
export interface SyncJob {
	/** Domain object identifier: the unique key. */
	objectId: string;
	state: SyncJobState;
	/** Number of failed attempts so far. */
	attempts: number;
	/** Earliest time (ms since epoch) a worker may pick the job up. */
	nextEligibleAt: number;
	lastError: string | null;
	/** External key, recorded as soon as the external creation is confirmed. */
	externalKey: string | null;
	/** Worker currently holding the job, while `in_flight`. */
	lockedBy: string | null;
	/** When the current holder acquired the job (ms since epoch). */
	lockedAt: number | null;
	/** Incremented on every transition; the compare-and-swap token. */
	version: number;
	subject: JobSubject;
	createdAt: number;
	/** Start of the current retry window: the claim, or the latest operator re-queue. */
	claimedAt: number;
	updatedAt: number;
}
