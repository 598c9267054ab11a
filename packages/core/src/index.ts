export { type BackoffPolicy, computeBackoff } from "./backoff";
export * from "./config";
export {
	type CreatedIssue,
	ExternalCallError,
	type ExternalIssueClient,
	type ExternalIssueRequest,
} from "./external";
export { type LogEntry, Logger, type LogLevel, parseLogLevel } from "./logger";
export * from "./result";
export { hasPlaceholder, MAX_SUMMARY_LENGTH, renderSummary, type SummaryVariables } from "./summary";
export * from "./trigger";
export {
	type Actor,
	type DomainObject,
	isSyncJobState,
	type JobSubject,
	type Membership,
	SYNC_JOB_STATES,
	type SyncJob,
	type SyncJobState,
} from "./types";
