// ---------------------------------------------------------------------------
// External issue client contract: implemented by connector packages
// ---------------------------------------------------------------------------

import { TrackLinkError } from "./result/errors";
import type { Result } from "./result/result";

/**
 * Request to create one issue in the external tracker.
 *
 * `extraFields` are merged into the serialised field map keyed by the
 * tracker's field id, so new fields can be sent without touching callers.
 */
export interface ExternalIssueRequest {
	projectKey: string;
	issueType: string;
	summary: string;
	description?: string | null;
	extraFields?: Readonly<Record<string, unknown>>;
}

/** The created issue as reported by the tracker. */
export interface CreatedIssue {
	/** Opaque external key, e.g. `"ABC-123"`. */
	key: string;
	id?: string;
	self?: string;
}

/**
 * Failure of a single external call.
 *
 * Connectors decide `retryable` because only they know what their status
 * codes mean; the worker acts on it without inspecting the cause.
 */
export class ExternalCallError extends TrackLinkError {
	readonly retryable: boolean;
	/** HTTP status, or `null` when no response arrived. */
	readonly statusCode: number | null;
	/** Minimum wait requested by the tracker (e.g. `Retry-After`), if any. */
	readonly retryAfterMs: number | null;

	constructor(
		message: string,
		code: string,
		options: { retryable: boolean; statusCode?: number | null; retryAfterMs?: number | null },
		cause?: Error,
	) {
		super(message, code, cause);
		this.retryable = options.retryable;
		this.statusCode = options.statusCode ?? null;
		this.retryAfterMs = options.retryAfterMs ?? null;
	}
}

/** A single-attempt client for the external tracker. Retrying is the caller's job. */
export interface ExternalIssueClient {
	createIssue(
		request: ExternalIssueRequest,
		signal?: AbortSignal,
	): Promise<Result<CreatedIssue, ExternalCallError>>;
}
