export { PgSyncJobStore } from "./pg-job-store";
export { createPool, type PgPoolConfig, type PgQueryable, runMigrations } from "./pg-pool";
