import { Pool, type PoolConfig } from "pg";

export interface PgPoolConfig {
	readonly connectionString: string;
	readonly poolMax?: number;
	readonly idleTimeoutMs?: number;
	readonly connectionTimeoutMs?: number;
}

/**
 * The subset of a pg `Pool` the job store uses. A real `Pool` satisfies it;
 * tests pass an in-process fake.
 */
export interface PgQueryable {
	query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
	end(): Promise<void>;
}

/** Create a pg Pool from configuration */
export function createPool(config: PgPoolConfig): Pool {
	const poolConfig: PoolConfig = {
		connectionString: config.connectionString,
		max: config.poolMax ?? 10,
		idleTimeoutMillis: config.idleTimeoutMs ?? 10_000,
		connectionTimeoutMillis: config.connectionTimeoutMs ?? 30_000,
	};
	return new Pool(poolConfig);
}

const INIT_SQL = `
CREATE TABLE IF NOT EXISTS sync_jobs (
	object_id TEXT PRIMARY KEY,
	state TEXT NOT NULL,
	attempts INTEGER NOT NULL DEFAULT 0,
	next_eligible_at BIGINT NOT NULL,
	last_error TEXT,
	external_key TEXT,
	locked_by TEXT,
	locked_at BIGINT,
	version INTEGER NOT NULL DEFAULT 1,
	project_id TEXT NOT NULL,
	title TEXT NOT NULL,
	description TEXT,
	created_at BIGINT NOT NULL,
	claimed_at BIGINT NOT NULL,
	updated_at BIGINT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_sync_jobs_eligible ON sync_jobs (state, next_eligible_at);
CREATE INDEX IF NOT EXISTS idx_sync_jobs_updated ON sync_jobs (updated_at DESC);
`;

/** Run the initial migration against the given pool */
export async function runMigrations(pool: PgQueryable): Promise<void> {
	await pool.query(INIT_SQL);
}
