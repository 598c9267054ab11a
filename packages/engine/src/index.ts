export { classifyFailure, describeFailure, type FailureStage, type SyncFailure } from "./classify";
export { SyncEngine, type SyncEngineConfig, type TriggerOutcome } from "./engine";
export { JobStateError, type JobStateErrorCode, wrapStore, wrapStoreSync } from "./errors";
export { type HostOperation, type HostPersistence, MemoryHostPersistence } from "./host-persistence";
export {
	type ClaimOutcome,
	IdempotencyGuard,
	resetToPendingPatch,
	snapshotSubject,
} from "./idempotency-guard";
export {
	DEFAULT_LIST_LIMIT,
	type JobListFilter,
	type JobPatch,
	type JobStateCounts,
	type NewSyncJob,
	type SyncJobStore,
} from "./job-store";
export { MemorySyncJobStore } from "./memory-job-store";
export { Counter, type ExternalCallOutcome, Gauge, Histogram, type Labels, SyncMetrics } from "./metrics";
export {
	DEFAULT_ENGINE_OPTIONS,
	type EngineOptions,
	type ResolvedEngineOptions,
	resolveEngineOptions,
} from "./options";
export { createPool, type PgPoolConfig, type PgQueryable, PgSyncJobStore, runMigrations } from "./postgres";
export { requeueTerminalJob } from "./requeue";
export { PollingScheduler } from "./scheduler";
export { SqliteSyncJobStore } from "./sqlite-job-store";
export { creationNote, StateWriter } from "./state-writer";
export { runWithTimeout } from "./timeout";
export { type ExternalClientFactory, SyncWorker, type SyncWorkerDeps } from "./worker";
export { SyncWorkerPool } from "./worker-pool";
