import Database from "better-sqlite3";
import type { JobStoreError, Result, SyncJob } from "@tracklink/core";
import { wrapStoreSync } from "./errors";
import {
	createPendingJob,
	DEFAULT_LIST_LIMIT,
	emptyStateCounts,
	type JobListFilter,
	type JobPatch,
	type JobStateCounts,
	type NewSyncJob,
	type SyncJobStore,
} from "./job-store";
import { addCount, JOB_COLUMNS, jobToValues, patchColumns, rowToJob } from "./job-row";

const INIT_SQL = `
CREATE TABLE IF NOT EXISTS sync_jobs (
	object_id TEXT PRIMARY KEY,
	state TEXT NOT NULL,
	attempts INTEGER NOT NULL DEFAULT 0,
	next_eligible_at INTEGER NOT NULL,
	last_error TEXT,
	external_key TEXT,
	locked_by TEXT,
	locked_at INTEGER,
	version INTEGER NOT NULL DEFAULT 1,
	project_id TEXT NOT NULL,
	title TEXT NOT NULL,
	description TEXT,
	created_at INTEGER NOT NULL,
	claimed_at INTEGER NOT NULL,
	updated_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_sync_jobs_eligible ON sync_jobs (state, next_eligible_at);
`;

/**
 * SQLite-backed job store using `better-sqlite3`.
 *
 * better-sqlite3 is synchronous and SQLite serialises writers, so the
 * conditional statements below are atomic across every process sharing
 * the database file. WAL mode lets the CLI read while workers write.
 */
export class SqliteSyncJobStore implements SyncJobStore {
	private readonly db: Database.Database;

	/** Open (or create) the database at `path`. Use `":memory:"` for a throwaway store. */
	constructor(path: string) {
		this.db = new Database(path);
		this.db.pragma("journal_mode = WAL");
		this.db.pragma("busy_timeout = 5000");
		this.db.exec(INIT_SQL);
	}

	async insertIfAbsent(input: NewSyncJob): Promise<Result<SyncJob | null, JobStoreError>> {
		return wrapStoreSync(() => {
			const job = createPendingJob(input);
			const placeholders = JOB_COLUMNS.map(() => "?").join(", ");
			const row: unknown = this.db
				.prepare(
					`INSERT INTO sync_jobs (${JOB_COLUMNS.join(", ")}) VALUES (${placeholders})
					 ON CONFLICT (object_id) DO NOTHING
					 RETURNING *`,
				)
				.get(...jobToValues(job));
			return row === undefined ? null : rowToJob(row);
		}, "Failed to insert sync job");
	}

	async get(objectId: string): Promise<Result<SyncJob | null, JobStoreError>> {
		return wrapStoreSync(() => {
			const row: unknown = this.db.prepare("SELECT * FROM sync_jobs WHERE object_id = ?").get(objectId);
			return row === undefined ? null : rowToJob(row);
		}, "Failed to get sync job");
	}

	async list(filter: JobListFilter = {}): Promise<Result<SyncJob[], JobStoreError>> {
		return wrapStoreSync(() => {
			const limit = filter.limit ?? DEFAULT_LIST_LIMIT;
			const rows: unknown[] =
				filter.state === undefined
					? this.db.prepare("SELECT * FROM sync_jobs ORDER BY updated_at DESC LIMIT ?").all(limit)
					: this.db
							.prepare("SELECT * FROM sync_jobs WHERE state = ? ORDER BY updated_at DESC LIMIT ?")
							.all(filter.state, limit);
			return rows.map(rowToJob);
		}, "Failed to list sync jobs");
	}

	async listEligible(
		now: number,
		staleBefore: number,
		limit: number,
	): Promise<Result<SyncJob[], JobStoreError>> {
		return wrapStoreSync(() => {
			const rows: unknown[] = this.db
				.prepare(
					`SELECT * FROM sync_jobs
					 WHERE (state IN ('pending', 'failed_retryable') AND next_eligible_at <= ?)
					    OR (state = 'in_flight' AND locked_at < ?)
					 ORDER BY next_eligible_at ASC, created_at ASC
					 LIMIT ?`,
				)
				.all(now, staleBefore, limit);
			return rows.map(rowToJob);
		}, "Failed to list eligible sync jobs");
	}

	async transition(
		objectId: string,
		expectedVersion: number,
		patch: JobPatch,
	): Promise<Result<SyncJob | null, JobStoreError>> {
		return wrapStoreSync(() => {
			const cols = patchColumns(patch);
			const assignments = cols.map(([column]) => `${column} = ?`).join(", ");
			const row: unknown = this.db
				.prepare(
					`UPDATE sync_jobs SET ${assignments}, version = version + 1
					 WHERE object_id = ? AND version = ?
					 RETURNING *`,
				)
				.get(...cols.map(([, value]) => value), objectId, expectedVersion);
			return row === undefined ? null : rowToJob(row);
		}, "Failed to transition sync job");
	}

	async countByState(): Promise<Result<JobStateCounts, JobStoreError>> {
		return wrapStoreSync(() => {
			const counts = emptyStateCounts();
			const rows: unknown[] = this.db
				.prepare("SELECT state, COUNT(*) AS n FROM sync_jobs GROUP BY state")
				.all();
			for (const row of rows) {
				addCount(counts, row);
			}
			return counts;
		}, "Failed to count sync jobs");
	}

	async close(): Promise<void> {
		this.db.close();
	}
}

