import type { JobStoreError, Result, SyncJob } from "@tracklink/core";
import { wrapStore } from "../errors";
import { addCount, JOB_COLUMNS, jobToValues, patchColumns, rowToJob } from "../job-row";
import {
	createPendingJob,
	DEFAULT_LIST_LIMIT,
	emptyStateCounts,
	type JobListFilter,
	type JobPatch,
	type JobStateCounts,
	type NewSyncJob,
	type SyncJobStore,
} from "../job-store";
import type { PgQueryable } from "./pg-pool";

/**
 * Postgres-backed job store.
 *
 * Claims rely on the `object_id` primary key (`ON CONFLICT DO NOTHING`);
 * transitions on a `version` match in the `WHERE` clause. Both are single
 * statements, so concurrent workers in separate processes never see a
 * half-applied change.
 */
export class PgSyncJobStore implements SyncJobStore {
	constructor(private readonly pool: PgQueryable) {}

	async insertIfAbsent(input: NewSyncJob): Promise<Result<SyncJob | null, JobStoreError>> {
		const job = createPendingJob(input);
		const placeholders = JOB_COLUMNS.map((_, i) => `$${i + 1}`).join(", ");

		return wrapStore(async () => {
			const result = await this.pool.query(
				`INSERT INTO sync_jobs (${JOB_COLUMNS.join(", ")})
				 VALUES (${placeholders})
				 ON CONFLICT (object_id) DO NOTHING
				 RETURNING *`,
				jobToValues(job),
			);
			if (result.rows.length === 0) return null;
			return rowToJob(result.rows[0]);
		}, "Failed to insert sync job");
	}

	async get(objectId: string): Promise<Result<SyncJob | null, JobStoreError>> {
		return wrapStore(async () => {
			const result = await this.pool.query("SELECT * FROM sync_jobs WHERE object_id = $1", [objectId]);
			if (result.rows.length === 0) return null;
			return rowToJob(result.rows[0]);
		}, "Failed to get sync job");
	}

	async list(filter: JobListFilter = {}): Promise<Result<SyncJob[], JobStoreError>> {
		const limit = filter.limit ?? DEFAULT_LIST_LIMIT;

		return wrapStore(async () => {
			const result =
				filter.state === undefined
					? await this.pool.query("SELECT * FROM sync_jobs ORDER BY updated_at DESC LIMIT $1", [limit])
					: await this.pool.query(
							"SELECT * FROM sync_jobs WHERE state = $1 ORDER BY updated_at DESC LIMIT $2",
							[filter.state, limit],
						);
			return result.rows.map(rowToJob);
		}, "Failed to list sync jobs");
	}

	async listEligible(
		now: number,
		staleBefore: number,
		limit: number,
	): Promise<Result<SyncJob[], JobStoreError>> {
		return wrapStore(async () => {
			const result = await this.pool.query(
				`SELECT * FROM sync_jobs
				 WHERE (state IN ('pending', 'failed_retryable') AND next_eligible_at <= $1)
				    OR (state = 'in_flight' AND locked_at < $2)
				 ORDER BY next_eligible_at ASC, created_at ASC
				 LIMIT $3`,
				[now, staleBefore, limit],
			);
			return result.rows.map(rowToJob);
		}, "Failed to list eligible sync jobs");
	}

	async transition(
		objectId: string,
		expectedVersion: number,
		patch: JobPatch,
	): Promise<Result<SyncJob | null, JobStoreError>> {
		const setClauses: string[] = [];
		const values: unknown[] = [];
		let paramIdx = 1;

		for (const [column, value] of patchColumns(patch)) {
			setClauses.push(`${column} = $${paramIdx++}`);
			values.push(value);
		}
		setClauses.push("version = version + 1");
		values.push(objectId, expectedVersion);

		return wrapStore(async () => {
			const result = await this.pool.query(
				`UPDATE sync_jobs SET ${setClauses.join(", ")}
				 WHERE object_id = $${paramIdx} AND version = $${paramIdx + 1}
				 RETURNING *`,
				values,
			);
			if (result.rows.length === 0) return null;
			return rowToJob(result.rows[0]);
		}, "Failed to transition sync job");
	}

	async countByState(): Promise<Result<JobStateCounts, JobStoreError>> {
		return wrapStore(async () => {
			const result = await this.pool.query("SELECT state, COUNT(*) AS n FROM sync_jobs GROUP BY state");
			const counts = emptyStateCounts();
			for (const row of result.rows) {
				addCount(counts, row);
			}
			return counts;
		}, "Failed to count sync jobs");
	}

	async close(): Promise<void> {
		await this.pool.end();
	}
}
