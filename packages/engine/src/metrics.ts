// ---------------------------------------------------------------------------
// Prometheus-Compatible Metrics: counters, gauges, histograms
// ---------------------------------------------------------------------------

import type { JobStateCounts } from "./job-store";

/** Label set for a metric observation. */
export type Labels = Record<string, string>;

// ---------------------------------------------------------------------------
// Counter
// ---------------------------------------------------------------------------

/**
 * Monotonically increasing counter.
 *
 * @example
 * ```ts
 * const completed = new Counter("tracklink_jobs_completed_total", "Jobs finished");
 * completed.inc({ state: "succeeded" });
 * ```
 */
export class Counter {
	private readonly values = new Map<string, number>();

	constructor(
		readonly name: string,
		readonly help: string,
	) {}

	/** Increment the counter by `n` (default 1). */
	inc(labels: Labels = {}, n = 1): void {
		const key = labelKey(labels);
		this.values.set(key, (this.values.get(key) ?? 0) + n);
	}

	/** Return the current value for the given labels. */
	get(labels: Labels = {}): number {
		return this.values.get(labelKey(labels)) ?? 0;
	}

	reset(): void {
		this.values.clear();
	}

	/** Serialise to Prometheus text exposition format. */
	expose(): string {
		return exposeSeries(this.name, this.help, "counter", this.values);
	}
}

// ---------------------------------------------------------------------------
// Gauge
// ---------------------------------------------------------------------------

/** Gauge that can go up and down. */
export class Gauge {
	private readonly values = new Map<string, number>();

	constructor(
		readonly name: string,
		readonly help: string,
	) {}

	/** Set to an absolute value. */
	set(labels: Labels = {}, value = 0): void {
		this.values.set(labelKey(labels), value);
	}

	inc(labels: Labels = {}, n = 1): void {
		const key = labelKey(labels);
		this.values.set(key, (this.values.get(key) ?? 0) + n);
	}

	dec(labels: Labels = {}, n = 1): void {
		this.inc(labels, -n);
	}

	get(labels: Labels = {}): number {
		return this.values.get(labelKey(labels)) ?? 0;
	}

	reset(): void {
		this.values.clear();
	}

	expose(): string {
		return exposeSeries(this.name, this.help, "gauge", this.values);
	}
}

// ---------------------------------------------------------------------------
// Histogram
// ---------------------------------------------------------------------------

interface HistogramBucket {
	bucketCounts: number[];
	sum: number;
	count: number;
}

/**
 * Histogram with configurable buckets.
 *
 * @example
 * ```ts
 * const latency = new Histogram("tracklink_external_call_duration_ms", "Call latency", [50, 250, 1000]);
 * latency.observe({}, 42);
 * ```
 */
export class Histogram {
	private readonly data = new Map<string, HistogramBucket>();
	readonly buckets: number[];

	constructor(
		readonly name: string,
		readonly help: string,
		buckets: number[],
	) {
		this.buckets = [...buckets].sort((a, b) => a - b);
	}

	/** Record an observation. */
	observe(labels: Labels = {}, value = 0): void {
		const key = labelKey(labels);
		let bucket = this.data.get(key);
		if (!bucket) {
			// Last slot is +Inf
			bucket = { bucketCounts: this.buckets.map(() => 0).concat(0), sum: 0, count: 0 };
			this.data.set(key, bucket);
		}
		bucket.sum += value;
		bucket.count += 1;
		const counts = bucket.bucketCounts;
		this.buckets.forEach((le, i) => {
			if (value <= le) counts[i] = (counts[i] ?? 0) + 1;
		});
		counts[this.buckets.length] = (counts[this.buckets.length] ?? 0) + 1;
	}

	getCount(labels: Labels = {}): number {
		return this.data.get(labelKey(labels))?.count ?? 0;
	}

	getSum(labels: Labels = {}): number {
		return this.data.get(labelKey(labels))?.sum ?? 0;
	}

	reset(): void {
		this.data.clear();
	}

	expose(): string {
		const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} histogram`];

		for (const [key, bucket] of this.data) {
			const separator = key === "" ? "{" : `${key.slice(0, -1)},`;
			this.buckets.forEach((le, i) => {
				lines.push(`${this.name}_bucket${separator}le="${le}"} ${bucket.bucketCounts[i]}`);
			});
			lines.push(
				`${this.name}_bucket${separator}le="+Inf"} ${bucket.bucketCounts[this.buckets.length]}`,
			);
			lines.push(`${this.name}_sum${key} ${bucket.sum}`);
			lines.push(`${this.name}_count${key} ${bucket.count}`);
		}

		return lines.join("\n");
	}
}

// ---------------------------------------------------------------------------
// Sync metrics registry
// ---------------------------------------------------------------------------

/** Outcome label for `tracklink_external_calls_total`. */
export type ExternalCallOutcome = "created" | "transient" | "permanent" | "timeout";

/**
 * Metrics recorded by the trigger path and the workers.
 *
 * `expose()` returns the complete Prometheus text payload; queue depth
 * gauges are refreshed from the store via {@link SyncMetrics.recordQueueDepth}.
 */
export class SyncMetrics {
	readonly jobsClaimed = new Counter("tracklink_jobs_claimed_total", "Sync jobs claimed by the trigger path");
	readonly jobsCompleted = new Counter(
		"tracklink_jobs_completed_total",
		"Sync jobs that reached a final or retry state, by state",
	);
	readonly externalCalls = new Counter(
		"tracklink_external_calls_total",
		"External issue creation calls, by outcome",
	);
	readonly externalCallDuration = new Histogram(
		"tracklink_external_call_duration_ms",
		"External issue creation latency in milliseconds",
		[50, 100, 250, 500, 1000, 5000, 30000],
	);
	readonly queueDepth = new Gauge("tracklink_jobs", "Sync jobs currently stored, by state");

	/** Copy per-state counts into the `tracklink_jobs` gauge. */
	recordQueueDepth(counts: JobStateCounts): void {
		for (const [state, n] of Object.entries(counts)) {
			this.queueDepth.set({ state }, n);
		}
	}

	expose(): string {
		const sections = [
			this.jobsClaimed.expose(),
			this.jobsCompleted.expose(),
			this.externalCalls.expose(),
			this.externalCallDuration.expose(),
			this.queueDepth.expose(),
		];
		return `${sections.join("\n\n")}\n`;
	}

	reset(): void {
		this.jobsClaimed.reset();
		this.jobsCompleted.reset();
		this.externalCalls.reset();
		this.externalCallDuration.reset();
		this.queueDepth.reset();
	}
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function exposeSeries(name: string, help: string, type: string, values: Map<string, number>): string {
	const lines = [`# HELP ${name} ${help}`, `# TYPE ${name} ${type}`];
	for (const [key, val] of values) {
		lines.push(`${name}${key} ${val}`);
	}
	return lines.join("\n");
}

/** Build a Prometheus-format label key string like `{state="succeeded"}`. */
function labelKey(labels: Labels): string {
	const entries = Object.entries(labels);
	if (entries.length === 0) return "";
	const parts = entries.map(([k, v]) => `${k}="${v}"`).join(",");
	return `{${parts}}`;
}
