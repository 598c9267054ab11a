// ---------------------------------------------------------------------------
// PollingScheduler: start/stop lifecycle for a periodic async task
// ---------------------------------------------------------------------------

/**
 * Runs `pollFn` every `intervalMs`, waiting for each run to finish before
 * scheduling the next, so runs of one scheduler never overlap.
 */
export class PollingScheduler {
	private readonly pollFn: () => Promise<void>;
	private readonly intervalMs: number;
	private readonly onError: (error: unknown) => void;
	private timer: ReturnType<typeof setTimeout> | null = null;
	private running = false;
	private current: Promise<void> | null = null;

	/**
	 * @param onError - Receives anything `pollFn` throws. The loop keeps going.
	 */
	constructor(pollFn: () => Promise<void>, intervalMs: number, onError: (error: unknown) => void) {
		this.pollFn = pollFn;
		this.intervalMs = intervalMs;
		this.onError = onError;
	}

	/** Start the polling loop; the first run happens immediately. No-op if already running. */
	start(): void {
		if (this.running) return;
		this.running = true;
		this.tick();
	}

	/** Stop scheduling and wait for a run in progress to finish. */
	async stop(): Promise<void> {
		this.running = false;
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
		if (this.current) await this.current;
	}

	get isRunning(): boolean {
		return this.running;
	}

	/** Execute a single poll cycle without the timer loop. */
	async pollOnce(): Promise<void> {
		return this.pollFn();
	}

	private tick(): void {
		this.timer = null;
		this.current = this.pollFn()
			.catch((error: unknown) => this.onError(error))
			.finally(() => {
				this.current = null;
				this.schedule();
			});
	}

	private schedule(): void {
		if (!this.running) return;
		this.timer = setTimeout(() => this.tick(), this.intervalMs);
	}
}
