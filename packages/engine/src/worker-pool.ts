import { type Logger, toError } from "@tracklink/core";
import { PollingScheduler } from "./scheduler";
import type { SyncWorker } from "./worker";

/**
 * Drives a fixed set of workers, each on its own polling loop.
 *
 * Workers never share a job: the store's compare-and-swap decides which
 * one acquires it.
 */
export class SyncWorkerPool {
	private readonly workers: ReadonlyArray<SyncWorker>;
	private readonly schedulers: ReadonlyArray<PollingScheduler>;
	private readonly logger: Logger;

	constructor(workers: ReadonlyArray<SyncWorker>, pollIntervalMs: number, logger: Logger) {
		this.workers = workers;
		this.logger = logger;
		this.schedulers = workers.map(
			(worker) =>
				new PollingScheduler(
					async () => {
						await worker.runOnce();
					},
					pollIntervalMs,
					(error) =>
						this.logger.error("worker poll failed", {
							workerId: worker.id,
							error: toError(error).message,
						}),
				),
		);
	}

	get size(): number {
		return this.workers.length;
	}

	get isRunning(): boolean {
		return this.schedulers.some((s) => s.isRunning);
	}

	/** Start every worker's polling loop. */
	start(): void {
		for (const scheduler of this.schedulers) scheduler.start();
		this.logger.info("worker pool started", { workers: this.workers.length });
	}

	/** Stop polling and wait for attempts in progress to finish. */
	async stop(): Promise<void> {
		await Promise.all(this.schedulers.map((s) => s.stop()));
		this.logger.info("worker pool stopped", { workers: this.workers.length });
	}

	/**
	 * Run every worker until none of them acquires a job.
	 *
	 * Jobs scheduled for a later retry are left alone, so a drain ends even
	 * while retries are outstanding.
	 *
	 * @returns Total number of jobs acquired.
	 */
	async drain(): Promise<number> {
		let total = 0;
		for (;;) {
			const counts = await Promise.all(this.workers.map((w) => w.runOnce()));
			const round = counts.reduce((sum, n) => sum + n, 0);
			if (round === 0) return total;
			total += round;
		}
	}
}
