// ---------------------------------------------------------------------------
// SQL row <-> SyncJob mapping shared by the SQLite and Postgres stores
// ---------------------------------------------------------------------------

import { isSyncJobState, JobStoreError, type SyncJob } from "@tracklink/core";
import type { JobPatch, JobStateCounts } from "./job-store";

/** Column list in insert order. */
export const JOB_COLUMNS = [
	"object_id",
	"state",
	"attempts",
	"next_eligible_at",
	"last_error",
	"external_key",
	"locked_by",
	"locked_at",
	"version",
	"project_id",
	"title",
	"description",
	"created_at",
	"claimed_at",
	"updated_at",
] as const;

/** A value either driver accepts as a bind parameter. */
export type SqlValue = string | number | null;

/** Values for {@link JOB_COLUMNS}, in the same order. */
export function jobToValues(job: SyncJob): SqlValue[] {
	return [
		job.objectId,
		job.state,
		job.attempts,
		job.nextEligibleAt,
		job.lastError,
		job.externalKey,
		job.lockedBy,
		job.lockedAt,
		job.version,
		job.subject.projectId,
		job.subject.title,
		job.subject.description,
		job.createdAt,
		job.claimedAt,
		job.updatedAt,
	];
}

/**
 * The `SET` assignments a patch translates to, excluding `version`
 * (callers append `version = version + 1`).
 */
export function patchColumns(patch: JobPatch): Array<[string, SqlValue]> {
	const cols: Array<[string, SqlValue]> = [
		["state", patch.state],
		["updated_at", patch.updatedAt],
	];
	if (patch.attempts !== undefined) cols.push(["attempts", patch.attempts]);
	if (patch.nextEligibleAt !== undefined) cols.push(["next_eligible_at", patch.nextEligibleAt]);
	if (patch.lastError !== undefined) cols.push(["last_error", patch.lastError]);
	if (patch.externalKey !== undefined) cols.push(["external_key", patch.externalKey]);
	if (patch.lockedBy !== undefined) cols.push(["locked_by", patch.lockedBy]);
	if (patch.lockedAt !== undefined) cols.push(["locked_at", patch.lockedAt]);
	if (patch.claimedAt !== undefined) cols.push(["claimed_at", patch.claimedAt]);
	if (patch.subject !== undefined) {
		cols.push(["project_id", patch.subject.projectId]);
		cols.push(["title", patch.subject.title]);
		cols.push(["description", patch.subject.description]);
	}
	return cols;
}

/** Map a driver row to a {@link SyncJob}, rejecting rows that do not fit the schema. */
export function rowToJob(row: unknown): SyncJob {
	if (typeof row !== "object" || row === null) {
		throw new JobStoreError("Malformed sync_jobs row");
	}
	const state: unknown = Reflect.get(row, "state");
	if (!isSyncJobState(state)) {
		throw new JobStoreError(`Unknown job state ${JSON.stringify(state)}`);
	}
	return {
		objectId: text(row, "object_id"),
		state,
		attempts: int(row, "attempts"),
		nextEligibleAt: int(row, "next_eligible_at"),
		lastError: nullableText(row, "last_error"),
		externalKey: nullableText(row, "external_key"),
		lockedBy: nullableText(row, "locked_by"),
		lockedAt: nullableInt(row, "locked_at"),
		version: int(row, "version"),
		subject: {
			projectId: text(row, "project_id"),
			title: text(row, "title"),
			description: nullableText(row, "description"),
		},
		createdAt: int(row, "created_at"),
		claimedAt: int(row, "claimed_at"),
		updatedAt: int(row, "updated_at"),
	};
}

function text(row: object, column: string): string {
	const value: unknown = Reflect.get(row, column);
	if (typeof value !== "string") throw new JobStoreError(`Column ${column} is not text`);
	return value;
}

function nullableText(row: object, column: string): string | null {
	const value: unknown = Reflect.get(row, column);
	return value === null || value === undefined ? null : text(row, column);
}

// pg returns BIGINT as a string; SQLite returns a number.
function int(row: object, column: string): number {
	const value: unknown = Reflect.get(row, column);
	const n = typeof value === "string" ? Number(value) : value;
	if (typeof n !== "number" || !Number.isFinite(n)) {
		throw new JobStoreError(`Column ${column} is not numeric`);
	}
	return n;
}

function nullableInt(row: object, column: string): number | null {
	const value: unknown = Reflect.get(row, column);
	return value === null || value === undefined ? null : int(row, column);
}

/** Fold one `{ state, n }` aggregate row into `counts`. */
export function addCount(counts: JobStateCounts, row: unknown): void {
	if (typeof row !== "object" || row === null) return;
	const state: unknown = Reflect.get(row, "state");
	if (!isSyncJobState(state)) return;
	counts[state] = int(row, "n");
}
