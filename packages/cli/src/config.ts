import {
	type ConfigurationProvider,
	EnvConfigurationProvider,
	JsonFileConfigurationProvider,
} from "@tracklink/core";
import {
	createPool,
	PgSyncJobStore,
	runMigrations,
	SqliteSyncJobStore,
	type SyncJobStore,
} from "@tracklink/engine";

/** Where the job store lives. */
export type StoreTarget =
	| { kind: "sqlite"; path: string }
	| { kind: "pg"; connectionString: string };

/**
 * Pick the job store from `--sqlite <path>` / `--pg <url>`, falling back
 * to `TRACKLINK_SQLITE_PATH` / `TRACKLINK_DATABASE_URL`. Flags win over
 * the environment; SQLite wins when both of a kind are given.
 */
export function resolveStoreTarget(
	flags: Record<string, string>,
	env: NodeJS.ProcessEnv = process.env,
): StoreTarget | null {
	const sqlite = usable(flags.sqlite);
	if (sqlite) return { kind: "sqlite", path: sqlite };
	const pg = usable(flags.pg);
	if (pg) return { kind: "pg", connectionString: pg };

	const sqliteEnv = usable(env.TRACKLINK_SQLITE_PATH);
	if (sqliteEnv) return { kind: "sqlite", path: sqliteEnv };
	const pgEnv = usable(env.TRACKLINK_DATABASE_URL);
	if (pgEnv) return { kind: "pg", connectionString: pgEnv };
	return null;
}

/** Open the store at `target`, creating its schema when missing. */
export async function openStore(target: StoreTarget): Promise<SyncJobStore> {
	if (target.kind === "sqlite") return new SqliteSyncJobStore(target.path);
	const pool = createPool({ connectionString: target.connectionString, poolMax: 2 });
	await runMigrations(pool);
	return new PgSyncJobStore(pool);
}

/** Sync settings from `--config <file.json>`, or else from `TRACKLINK_*` variables. */
export function resolveConfigurationProvider(
	flags: Record<string, string>,
	env: NodeJS.ProcessEnv = process.env,
): ConfigurationProvider {
	const file = usable(flags.config);
	return file ? new JsonFileConfigurationProvider(file) : new EnvConfigurationProvider(env);
}

// A bare `--sqlite` parses as "true".
function usable(value: string | undefined): string | undefined {
	if (value === undefined || value === "true" || value.trim() === "") return undefined;
	return value;
}
