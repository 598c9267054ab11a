import {
	type Actor,
	type ConfigurationError,
	type ConfigurationProvider,
	type DomainObject,
	evaluateTrigger,
	isExplicitlyDisabled,
	type JobStoreError,
	loadSyncConfiguration,
	Logger,
	parseLogLevel,
	type RawSettings,
	type Result,
	type SkipReason,
	type SyncConfiguration,
	type SyncJob,
	toError,
	unwrapOrThrow,
} from "@tracklink/core";
import type { JobStateError } from "./errors";
import type { HostPersistence } from "./host-persistence";
import { IdempotencyGuard } from "./idempotency-guard";
import type { JobListFilter, JobStateCounts, SyncJobStore } from "./job-store";
import { SyncMetrics } from "./metrics";
import { type EngineOptions, type ResolvedEngineOptions, resolveEngineOptions } from "./options";
import { requeueTerminalJob } from "./requeue";
import { StateWriter } from "./state-writer";
import { type ExternalClientFactory, SyncWorker } from "./worker";
import { SyncWorkerPool } from "./worker-pool";

/** Collaborators and tuning for a {@link SyncEngine}. */
export interface SyncEngineConfig {
	store: SyncJobStore;
	host: HostPersistence;
	config: ConfigurationProvider;
	clientFactory: ExternalClientFactory;
	options?: EngineOptions;
	logger?: Logger;
	metrics?: SyncMetrics;
	/** Clock in ms since epoch. Defaults to `Date.now`. */
	now?: () => number;
}

/** What {@link SyncEngine.onObjectSaved} did with an event. */
export type TriggerOutcome =
	| { status: "skipped"; reason: SkipReason }
	/** Configuration missing or invalid; nothing was evaluated. */
	| { status: "inert"; error: ConfigurationError }
	| { status: "claimed"; job: SyncJob }
	| { status: "already_claimed"; job: SyncJob }
	| { status: "terminal"; job: SyncJob }
	/** The claim could not be written. */
	| { status: "error"; error: Error };

/**
 * Entry point for the host application.
 *
 * The host calls {@link SyncEngine.onObjectSaved} after every save; the
 * only I/O on that path is the claim insert. External calls happen in
 * workers created with {@link SyncEngine.createWorkerPool}.
 *
 * @example
 * ```ts
 * const engine = new SyncEngine({
 *   store: new SqliteSyncJobStore("tracklink.db"),
 *   host,
 *   config: new EnvConfigurationProvider(process.env),
 *   clientFactory: jiraClientFactory(),
 * });
 * const pool = engine.createWorkerPool();
 * pool.start();
 * await engine.onObjectSaved(before, after, actor);
 * ```
 */
export class SyncEngine {
	readonly options: ResolvedEngineOptions;
	readonly metrics: SyncMetrics;
	private readonly store: SyncJobStore;
	private readonly config: ConfigurationProvider;
	private readonly clientFactory: ExternalClientFactory;
	private readonly stateWriter: StateWriter;
	private readonly guard: IdempotencyGuard;
	private readonly logger: Logger;
	private readonly now: () => number;
	private workerSeq = 0;
	/** Last configuration problem logged, so each distinct one is logged once. */
	private lastConfigProblem: string | null = null;

	/** @throws {ConfigurationError} When `options` holds values the worker cannot run with. */
	constructor(config: SyncEngineConfig) {
		this.options = unwrapOrThrow(resolveEngineOptions(config.options));
		this.store = config.store;
		this.config = config.config;
		this.clientFactory = config.clientFactory;
		this.logger = config.logger ?? new Logger(parseLogLevel(process.env.TRACKLINK_LOG_LEVEL), { component: "tracklink" });
		this.metrics = config.metrics ?? new SyncMetrics();
		this.now = config.now ?? Date.now;
		this.stateWriter = new StateWriter(config.host, this.logger);
		this.guard = new IdempotencyGuard(this.store, this.options.reclaimTerminal, this.now);
	}

	/**
	 * Evaluate a save and claim the object when the trigger fires.
	 *
	 * Never rejects: every failure is logged and reported in the outcome,
	 * so the host's save path is unaffected.
	 */
	async onObjectSaved(
		before: DomainObject | null,
		after: DomainObject,
		actor: Actor,
	): Promise<TriggerOutcome> {
		const log = this.logger.child({ objectId: after.id });
		try {
			const raw = this.config.read();
			if (isExplicitlyDisabled(raw)) {
				log.debug("sync disabled; event ignored");
				return { status: "skipped", reason: "disabled" };
			}

			const cfg = this.loadConfiguration(raw);
			if (!cfg.ok) return { status: "inert", error: cfg.error };

			const decision = evaluateTrigger(before, after, actor, cfg.value);
			if (!decision.fire) {
				log.debug("trigger not fired", { reason: decision.reason });
				return { status: "skipped", reason: decision.reason };
			}

			const claim = await this.guard.tryClaim(after);
			if (!claim.ok) {
				log.error("failed to claim object", { error: claim.error.message });
				return { status: "error", error: claim.error };
			}

			const { status, job } = claim.value;
			if (status === "claimed") {
				this.metrics.jobsClaimed.inc();
				log.info("sync job claimed", { state: job.state, attempts: job.attempts });
			} else {
				log.debug("object already claimed", { status, state: job.state, attempts: job.attempts });
			}
			return claim.value;
		} catch (error) {
			const cause = toError(error);
			log.error("trigger evaluation failed", { error: cause.message });
			return { status: "error", error: cause };
		}
	}

	/**
	 * Put a Failed-Terminal job back to Pending with its attempts cleared.
	 *
	 * Operator action; the engine never calls it on its own.
	 */
	async requeueTerminal(objectId: string): Promise<Result<SyncJob, JobStateError | JobStoreError>> {
		const result = await requeueTerminalJob(this.store, objectId, this.now());
		if (result.ok) {
			this.logger.info("sync job re-queued", { objectId, state: result.value.state, attempts: 0 });
		}
		return result;
	}

	getJob(objectId: string): Promise<Result<SyncJob | null, JobStoreError>> {
		return this.store.get(objectId);
	}

	listJobs(filter?: JobListFilter): Promise<Result<SyncJob[], JobStoreError>> {
		return this.store.list(filter);
	}

	countJobs(): Promise<Result<JobStateCounts, JobStoreError>> {
		return this.store.countByState();
	}

	/** Create a worker. Ids default to `worker-<n>` in creation order. */
	createWorker(workerId?: string): SyncWorker {
		this.workerSeq++;
		return new SyncWorker({
			workerId: workerId ?? `worker-${this.workerSeq}`,
			store: this.store,
			stateWriter: this.stateWriter,
			config: this.config,
			clientFactory: this.clientFactory,
			options: this.options,
			metrics: this.metrics,
			logger: this.logger,
			now: this.now,
		});
	}

	/** Create a pool of `options.concurrency` workers. It does not start by itself. */
	createWorkerPool(): SyncWorkerPool {
		const workers = Array.from({ length: this.options.concurrency }, () => this.createWorker());
		return new SyncWorkerPool(workers, this.options.pollIntervalMs, this.logger);
	}

	/** Prometheus text payload, with queue depth refreshed from the store. */
	async metricsText(): Promise<string> {
		const counts = await this.store.countByState();
		if (counts.ok) {
			this.metrics.recordQueueDepth(counts.value);
		} else {
			this.logger.warn("failed to refresh queue depth", { error: counts.error.message });
		}
		return this.metrics.expose();
	}

	private loadConfiguration(raw: RawSettings): Result<SyncConfiguration, ConfigurationError> {
		const cfg = loadSyncConfiguration(raw);
		if (cfg.ok) {
			if (this.lastConfigProblem !== null) {
				this.logger.info("sync configuration valid again");
				this.lastConfigProblem = null;
			}
			return cfg;
		}
		if (cfg.error.message !== this.lastConfigProblem) {
			this.lastConfigProblem = cfg.error.message;
			this.logger.warn("sync configuration invalid; events ignored", {
				error: cfg.error.message,
				keys: cfg.error.keys,
			});
		}
		return cfg;
	}
}
