// ---------------------------------------------------------------------------
// Structured Logger: JSON lines with bound context
// ---------------------------------------------------------------------------

/** Supported log levels, ordered by severity. */
export type LogLevel = "debug" | "info" | "warn" | "error";

/** A single structured log entry. */
export interface LogEntry {
	level: LogLevel;
	msg: string;
	ts: string;
	[key: string]: unknown;
}

/** Numeric severity values for level comparison. */
const LEVEL_VALUE: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/** Narrow an arbitrary string (e.g. an env var) to a {@link LogLevel}. */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
	if (value === undefined) return fallback;
	const lower = value.trim().toLowerCase();
	return lower === "debug" || lower === "info" || lower === "warn" || lower === "error"
		? lower
		: fallback;
}

/**
 * Structured logger that writes one JSON object per line.
 *
 * Child loggers carry bound context, so a worker can bind `workerId`
 * once and a job handler can add `objectId` on top.
 *
 * @example
 * ```ts
 * const logger = new Logger("info");
 * const jobLogger = logger.child({ objectId: "42" });
 * jobLogger.warn("external call failed", { attempts: 2 });
 * // => {"level":"warn","msg":"external call failed","ts":"...","objectId":"42","attempts":2}
 * ```
 */
export class Logger {
	private readonly minLevel: LogLevel;
	private readonly bindings: Record<string, unknown>;

	/** Output function: defaults to stdout, overridable for testing. */
	private readonly writeFn: (line: string) => void;

	constructor(
		minLevel: LogLevel = "info",
		bindings: Record<string, unknown> = {},
		writeFn?: (line: string) => void,
	) {
		this.minLevel = minLevel;
		this.bindings = bindings;
		this.writeFn = writeFn ?? ((line) => process.stdout.write(`${line}\n`));
	}

	debug(msg: string, data?: Record<string, unknown>): void {
		this.log("debug", msg, data);
	}

	info(msg: string, data?: Record<string, unknown>): void {
		this.log("info", msg, data);
	}

	warn(msg: string, data?: Record<string, unknown>): void {
		this.log("warn", msg, data);
	}

	error(msg: string, data?: Record<string, unknown>): void {
		this.log("error", msg, data);
	}

	/**
	 * Create a child logger with additional bound context.
	 *
	 * The child inherits the parent's level and write function; child
	 * bindings win over parent bindings with the same key.
	 */
	child(bindings: Record<string, unknown>): Logger {
		return new Logger(this.minLevel, { ...this.bindings, ...bindings }, this.writeFn);
	}

	private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
		if (LEVEL_VALUE[level] < LEVEL_VALUE[this.minLevel]) return;

		const entry: LogEntry = {
			level,
			msg,
			ts: new Date().toISOString(),
			...this.bindings,
			...data,
		};

		this.writeFn(JSON.stringify(entry));
	}
}
