import {
	type DomainObject,
	Err,
	JobStoreError,
	type JobSubject,
	Ok,
	type Result,
	type SyncJob,
} from "@tracklink/core";
import type { JobPatch, SyncJobStore } from "./job-store";

/** Result of {@link IdempotencyGuard.tryClaim}. */
export type ClaimOutcome =
	/** A new Pending job now exists for the object. */
	| { status: "claimed"; job: SyncJob }
	/** A Pending, In-Flight, Failed-Retryable or Succeeded job already exists. */
	| { status: "already_claimed"; job: SyncJob }
	/** A Failed-Terminal job exists and re-claiming is disabled. */
	| { status: "terminal"; job: SyncJob };

/** Capture the fields a worker needs to render the issue. */
export function snapshotSubject(object: DomainObject): JobSubject {
	return {
		projectId: object.projectId,
		title: object.title,
		description: object.description ?? null,
	};
}

/**
 * Patch that puts a job back at the start of its lifecycle.
 *
 * A recorded `externalKey` survives, so a job whose issue already exists
 * goes straight to the write-back.
 */
export function resetToPendingPatch(now: number, subject?: JobSubject): JobPatch {
	return {
		state: "pending",
		updatedAt: now,
		attempts: 0,
		nextEligibleAt: now,
		lastError: null,
		lockedBy: null,
		lockedAt: null,
		claimedAt: now,
		subject,
	};
}

/**
 * Claims a domain object for synchronisation.
 *
 * The claim is the insertion of the object's job row, so at most one
 * caller wins no matter how many evaluations fire concurrently, and the
 * row left behind by a successful sync blocks every later claim.
 */
export class IdempotencyGuard {
	constructor(
		private readonly store: SyncJobStore,
		private readonly reclaimTerminal: boolean,
		private readonly now: () => number,
	) {}

	async tryClaim(object: DomainObject): Promise<Result<ClaimOutcome, JobStoreError>> {
		const subject = snapshotSubject(object);
		const inserted = await this.store.insertIfAbsent({
			objectId: object.id,
			subject,
			now: this.now(),
		});
		if (!inserted.ok) return inserted;
		if (inserted.value) return Ok({ status: "claimed", job: inserted.value });

		const existing = await this.store.get(object.id);
		if (!existing.ok) return existing;
		const job = existing.value;
		if (!job) {
			return Err(new JobStoreError(`Job for ${object.id} vanished after a conflicting insert`));
		}
		if (job.state !== "failed_terminal") return Ok({ status: "already_claimed", job });
		if (!this.reclaimTerminal) return Ok({ status: "terminal", job });

		const reset = await this.store.transition(job.objectId, job.version, resetToPendingPatch(this.now(), subject));
		if (!reset.ok) return reset;
		// Another evaluation re-claimed it first.
		if (!reset.value) return Ok({ status: "already_claimed", job });
		return Ok({ status: "claimed", job: reset.value });
	}
}
