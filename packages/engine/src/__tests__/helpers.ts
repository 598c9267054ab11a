import {
	type Actor,
	type CreatedIssue,
	type DomainObject,
	Err,
	ExternalCallError,
	type ExternalIssueClient,
	type ExternalIssueRequest,
	Logger,
	type LogLevel,
	Ok,
	type RawSettings,
	type Result,
	StaticConfigurationProvider,
} from "@tracklink/core";
import { SyncEngine } from "../engine";
import { MemoryHostPersistence } from "../host-persistence";
import type { SyncJobStore } from "../job-store";
import { MemorySyncJobStore } from "../memory-job-store";
import type { EngineOptions } from "../options";

export const START = 1_700_000_000_000;

/** Manually advanced clock. */
export function createClock(start = START): { now: () => number; advance: (ms: number) => void } {
	let t = start;
	return {
		now: () => t,
		advance: (ms: number) => {
			t += ms;
		},
	};
}

export const validSettings: RawSettings = {
	enabled: true,
	acceptedStatusId: "accepted",
	roleId: "developer",
	baseUrl: "https://tracker.example.test",
	projectKey: "ABC",
	issueType: "Task",
	email: "sync-bot@example.test",
	apiToken: "test-token",
	summaryTemplate: "[#{id}] {title}",
};

export function makeObject(overrides: Partial<DomainObject> = {}): DomainObject {
	return {
		id: "42",
		projectId: "proj-1",
		statusId: "accepted",
		title: "Login button misaligned",
		description: "Steps to reproduce",
		externalKey: null,
		...overrides,
	};
}

export const developer: Actor = {
	id: "user-1",
	memberships: [{ projectId: "proj-1", roleId: "developer" }],
};

export const outsider: Actor = {
	id: "user-2",
	memberships: [{ projectId: "proj-2", roleId: "developer" }],
};

/** A failure the way a connector reports one. */
export function externalError(
	statusCode: number,
	retryable: boolean,
	retryAfterMs: number | null = null,
): ExternalCallError {
	return new ExternalCallError(`HTTP ${statusCode}`, `HTTP_${statusCode}`, {
		retryable,
		statusCode,
		retryAfterMs,
	});
}

type Reply = Result<CreatedIssue, ExternalCallError> | (() => Promise<Result<CreatedIssue, ExternalCallError>>);

/** Scripted tracker client. Once the script runs out it creates `ABC-<n>`. */
export class FakeIssueClient implements ExternalIssueClient {
	readonly requests: ExternalIssueRequest[] = [];
	private readonly script: Reply[] = [];
	private created = 122;

	reply(...replies: Reply[]): this {
		this.script.push(...replies);
		return this;
	}

	async createIssue(request: ExternalIssueRequest): Promise<Result<CreatedIssue, ExternalCallError>> {
		this.requests.push(request);
		const next = this.script.shift();
		if (typeof next === "function") return next();
		if (next) return next;
		this.created++;
		return Ok({ key: `ABC-${this.created}` });
	}
}

/** Reply with a single error. */
export function fails(error: ExternalCallError): Reply {
	return Err(error);
}

/** Collects parsed log lines. */
export function captureLogs(level: LogLevel = "debug"): {
	logger: Logger;
	lines: Array<Record<string, unknown>>;
} {
	const lines: Array<Record<string, unknown>> = [];
	const logger = new Logger(level, {}, (line) => {
		lines.push(JSON.parse(line));
	});
	return { logger, lines };
}

/** Engine wired to in-memory collaborators and a manual clock. */
export function createTestEngine(
	opts: { options?: EngineOptions; settings?: RawSettings; store?: SyncJobStore } = {},
) {
	const clock = createClock();
	const store = opts.store ?? new MemorySyncJobStore();
	const host = new MemoryHostPersistence();
	const client = new FakeIssueClient();
	const provider = new StaticConfigurationProvider({ ...validSettings, ...opts.settings });
	const { logger, lines } = captureLogs();
	const engine = new SyncEngine({
		store,
		host,
		config: provider,
		clientFactory: () => client,
		options: { baseDelayMs: 1_000, maxDelayMs: 60_000, ...opts.options },
		logger,
		now: clock.now,
	});
	return { engine, store, host, client, provider, clock, logs: lines };
}
