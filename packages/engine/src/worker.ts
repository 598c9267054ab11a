import {
	ConfigurationError,
	type ConfigurationProvider,
	type CreatedIssue,
	computeBackoff,
	Err,
	ExternalCallError,
	type ExternalIssueClient,
	type ExternalIssueRequest,
	type LocalCommitError,
	loadSyncConfiguration,
	type Logger,
	Ok,
	renderSummary,
	type Result,
	type SyncConfiguration,
	type SyncJob,
	type TimeoutError,
	toError,
} from "@tracklink/core";
import { classifyFailure, describeFailure, type SyncFailure } from "./classify";
import type { JobPatch, SyncJobStore } from "./job-store";
import type { SyncMetrics } from "./metrics";
import type { ResolvedEngineOptions } from "./options";
import type { StateWriter } from "./state-writer";
import { runWithTimeout } from "./timeout";

/** Builds the tracker client for one attempt from that attempt's configuration. */
export type ExternalClientFactory = (cfg: SyncConfiguration) => ExternalIssueClient;

/** Collaborators of a {@link SyncWorker}. */
export interface SyncWorkerDeps {
	workerId: string;
	store: SyncJobStore;
	stateWriter: StateWriter;
	config: ConfigurationProvider;
	clientFactory: ExternalClientFactory;
	options: ResolvedEngineOptions;
	metrics: SyncMetrics;
	logger: Logger;
	now: () => number;
}

/**
 * Processes eligible sync jobs.
 *
 * Every state change is a compare-and-swap on the job's version. A worker
 * that loses one simply lets go of the job: whoever won owns it now. The
 * one exception is a key Jira has already confirmed, which is still
 * written to the host first.
 *
 * Configuration is read on every attempt. While sync is disabled, jobs
 * that still need an issue go back to Pending without using an attempt.
 */
export class SyncWorker {
	readonly id: string;
	private readonly deps: SyncWorkerDeps;
	private readonly logger: Logger;

	constructor(deps: SyncWorkerDeps) {
		this.deps = deps;
		this.id = deps.workerId;
		this.logger = deps.logger.child({ workerId: deps.workerId });
	}

	/**
	 * Acquire and process up to `batchSize` eligible jobs, one after another.
	 *
	 * @returns Number of jobs this worker acquired, however their attempts ended.
	 */
	async runOnce(): Promise<number> {
		const { store, options, now } = this.deps;
		const t = now();
		const eligible = await store.listEligible(t, t - options.processingTimeoutMs, options.batchSize);
		if (!eligible.ok) {
			this.logger.error("failed to list eligible jobs", { error: eligible.error.message });
			return 0;
		}

		let acquired = 0;
		for (const job of eligible.value) {
			if ((await this.run(job)).acquired) acquired++;
		}
		return acquired;
	}

	/**
	 * Acquire `job` and run one attempt.
	 *
	 * @returns The job as left by the attempt, or `null` when it could not be
	 * acquired or its final state could not be recorded.
	 */
	async process(job: SyncJob): Promise<SyncJob | null> {
		return (await this.run(job)).job;
	}

	private async run(job: SyncJob): Promise<{ acquired: boolean; job: SyncJob | null }> {
		const log = this.logger.child({ objectId: job.objectId, attempts: job.attempts });
		const t = this.deps.now();

		const acquired = await this.deps.store.transition(job.objectId, job.version, {
			state: "in_flight",
			updatedAt: t,
			lockedBy: this.id,
			lockedAt: t,
		});
		if (!acquired.ok) {
			log.warn("failed to acquire job", { state: job.state, error: acquired.error.message });
			return { acquired: false, job: null };
		}
		if (!acquired.value) {
			log.debug("job taken by another worker", { state: job.state });
			return { acquired: false, job: null };
		}
		if (job.state === "in_flight") {
			log.warn("took over stale in-flight job", { previousWorker: job.lockedBy });
		}

		try {
			return { acquired: true, job: await this.attempt(acquired.value, log) };
		} catch (error) {
			// The lease is left to expire; the job is retried once it goes stale.
			log.error("sync attempt crashed", { state: "in_flight", error: toError(error).message });
			return { acquired: true, job: null };
		}
	}

	private async attempt(job: SyncJob, log: Logger): Promise<SyncJob | null> {
		let current = job;
		let externalKey = job.externalKey;
		const objectId = job.objectId;

		// The host is read first on every attempt, including write-back retries:
		// a commit that timed out may still have landed.
		const hostKey = await runWithTimeout("host key read", this.deps.options.callTimeoutMs, () =>
			this.deps.stateWriter.currentExternalKey(objectId),
		);
		if (!hostKey.ok) return this.fail(current, classifyFailure(hostKey.error, "local_commit"), log);
		if (!hostKey.value.ok) {
			return this.fail(current, classifyFailure(hostKey.value.error, "local_commit"), log);
		}
		const stored = hostKey.value.value;
		if (stored !== null) {
			if (externalKey !== null && externalKey !== stored) {
				log.warn("object carries a different external key than the job", {
					externalKey,
					hostKey: stored,
				});
			}
			log.info("object already carries an external key; no call made", { externalKey: stored });
			return this.succeed(current, stored, log);
		}

		if (externalKey === null) {
			const cfg = this.readConfiguration();
			if (!cfg.ok) return this.fail(current, classifyFailure(cfg.error, "configuration"), log);
			if (!cfg.value.enabled) return this.defer(current, log);

			const created = await this.createIssue(current, cfg.value, log);
			if (!created.ok) return this.fail(current, created.error, log);
			const key = created.value;
			externalKey = key;

			const recorded = await this.patch(current, { state: "in_flight", externalKey: key }, log);
			if (recorded === "lost") {
				// Whoever holds the lease now finds the key on the object and makes no call.
				const written = await this.commitKey(objectId, key);
				if (written.ok) {
					log.info("external key written back after losing the lease", { externalKey: key });
				} else {
					log.error("failed to write back external key after losing the lease", {
						externalKey: key,
						error: written.error.message,
					});
				}
				return null;
			}
			if (recorded !== "error") current = recorded;
		} else {
			log.info("external issue already created; retrying write-back", { externalKey });
		}

		const committed = await this.commitKey(objectId, externalKey);
		if (!committed.ok) return this.fail(current, classifyFailure(committed.error, "local_commit"), log);

		return this.succeed(current, externalKey, log);
	}

	/** Host write-back of the key and its note, bounded by `callTimeoutMs`. */
	private async commitKey(
		objectId: string,
		externalKey: string,
	): Promise<Result<void, LocalCommitError | TimeoutError>> {
		const committed = await runWithTimeout("host write-back", this.deps.options.callTimeoutMs, () =>
			this.deps.stateWriter.commit(objectId, externalKey),
		);
		if (!committed.ok) return committed;
		return committed.value;
	}

	/**
	 * Sync was switched off after the claim. The job goes back to Pending
	 * without consuming an attempt and is looked at again after `maxDelayMs`.
	 */
	private async defer(job: SyncJob, log: Logger): Promise<SyncJob | null> {
		const { options, now } = this.deps;
		const nextEligibleAt = now() + options.maxDelayMs;
		const done = await this.patch(
			job,
			{
				state: "pending",
				nextEligibleAt,
				lastError: "[SYNC_DISABLED] Sync is disabled",
				lockedBy: null,
				lockedAt: null,
			},
			log,
		);
		if (done === "lost" || done === "error") return null;
		log.info("sync disabled; job deferred", { state: done.state, nextEligibleAt });
		return done;
	}

	private readConfiguration(): Result<SyncConfiguration, ConfigurationError> {
		try {
			return loadSyncConfiguration(this.deps.config.read());
		} catch (error) {
			const cause = toError(error);
			return Err(new ConfigurationError(`Failed to read configuration: ${cause.message}`, [], cause));
		}
	}

	private async createIssue(
		job: SyncJob,
		cfg: SyncConfiguration,
		log: Logger,
	): Promise<Result<string, SyncFailure>> {
		const { metrics, now, options } = this.deps;
		const request: ExternalIssueRequest = {
			projectKey: cfg.projectKey,
			issueType: cfg.issueType,
			summary: renderSummary(cfg.summaryTemplate, {
				id: job.objectId,
				title: job.subject.title,
				project: job.subject.projectId,
			}),
			description: job.subject.description,
			extraFields: options.extraFields,
		};

		const client = this.deps.clientFactory(cfg);
		const started = now();
		let outcome: Result<Result<CreatedIssue, ExternalCallError>, TimeoutError>;
		try {
			outcome = await runWithTimeout("external issue creation", options.callTimeoutMs, (signal) =>
				client.createIssue(request, signal),
			);
		} catch (error) {
			const cause = toError(error);
			outcome = Ok(Err(new ExternalCallError(cause.message, "EXTERNAL_CALL_FAILED", { retryable: true }, cause)));
		}
		metrics.externalCallDuration.observe({}, now() - started);

		if (!outcome.ok) {
			metrics.externalCalls.inc({ outcome: "timeout" });
			return Err(classifyFailure(outcome.error, "external_call"));
		}
		if (!outcome.value.ok) {
			const failure = classifyFailure(outcome.value.error, "external_call");
			metrics.externalCalls.inc({ outcome: failure.kind });
			return Err(failure);
		}

		metrics.externalCalls.inc({ outcome: "created" });
		log.info("external issue created", { externalKey: outcome.value.value.key });
		return Ok(outcome.value.value.key);
	}

	private async succeed(job: SyncJob, externalKey: string, log: Logger): Promise<SyncJob | null> {
		const done = await this.patch(
			job,
			{ state: "succeeded", externalKey, lastError: null, lockedBy: null, lockedAt: null },
			log,
		);
		if (done === "lost" || done === "error") return null;
		this.deps.metrics.jobsCompleted.inc({ state: "succeeded" });
		log.info("sync job succeeded", { state: done.state, externalKey });
		return done;
	}

	private async fail(job: SyncJob, failure: SyncFailure, log: Logger): Promise<SyncJob | null> {
		const { options, now } = this.deps;
		const t = now();
		const attempts = job.attempts + 1;
		const lastError = describeFailure(failure);
		const context = { attempts, stage: failure.stage, code: failure.code, lastError };

		const exhausted = attempts >= options.maxAttempts;
		const expired = t - job.claimedAt >= options.maxRetryWindowMs;
		if (failure.kind === "permanent" || exhausted || expired) {
			const done = await this.patch(
				job,
				{ state: "failed_terminal", attempts, lastError, lockedBy: null, lockedAt: null },
				log,
			);
			if (done === "lost" || done === "error") return null;
			this.deps.metrics.jobsCompleted.inc({ state: "failed_terminal" });
			log.error("sync job failed permanently", {
				...context,
				state: done.state,
				reason: failure.kind === "permanent" ? "permanent" : exhausted ? "max_attempts" : "retry_window",
			});
			const objectId = job.objectId;
			const noted = await runWithTimeout("failure note", options.callTimeoutMs, () =>
				this.deps.stateWriter.annotateFailure(objectId, `External issue creation failed: ${failure.message}`),
			);
			if (!noted.ok) log.warn("failed to append failure note", { error: noted.error.message });
			return done;
		}

		let delay = computeBackoff(attempts, options);
		if (failure.retryAfterMs !== null) {
			delay = Math.min(Math.max(delay, failure.retryAfterMs), options.maxDelayMs);
		}
		const done = await this.patch(
			job,
			{
				state: "failed_retryable",
				attempts,
				lastError,
				nextEligibleAt: t + delay,
				lockedBy: null,
				lockedAt: null,
			},
			log,
		);
		if (done === "lost" || done === "error") return null;
		this.deps.metrics.jobsCompleted.inc({ state: "failed_retryable" });
		log.warn("sync attempt failed; will retry", { ...context, state: done.state, delayMs: delay });
		return done;
	}

	/**
	 * CAS `job` forward. `"lost"` means another worker took the lease over;
	 * `"error"` means the store failed and the stale lease will hand the job
	 * to a later run.
	 */
	private async patch(
		job: SyncJob,
		patch: Omit<JobPatch, "updatedAt">,
		log: Logger,
	): Promise<SyncJob | "lost" | "error"> {
		const result = await this.deps.store.transition(job.objectId, job.version, {
			...patch,
			updatedAt: this.deps.now(),
		});
		if (!result.ok) {
			log.error("failed to record job state", {
				state: patch.state,
				attempts: job.attempts,
				error: result.error.message,
			});
			return "error";
		}
		if (!result.value) {
			log.warn("lost job lease before recording state", { state: patch.state });
			return "lost";
		}
		return result.value;
	}
}
