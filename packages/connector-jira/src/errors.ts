import { ExternalCallError } from "@tracklink/core";

/**
 * Pull a readable message out of a Jira error body.
 *
 * Jira answers with `{ errorMessages: string[], errors: { field: message } }`;
 * anything else is returned as-is.
 */
export function describeJiraErrorBody(body: string): string {
	let parsed: unknown;
	try {
		parsed = JSON.parse(body);
	} catch {
		return body;
	}
	if (typeof parsed !== "object" || parsed === null) return body;

	const parts: string[] = [];
	const messages: unknown = Reflect.get(parsed, "errorMessages");
	if (Array.isArray(messages)) {
		for (const m of messages) {
			if (typeof m === "string") parts.push(m);
		}
	}
	const fieldErrors: unknown = Reflect.get(parsed, "errors");
	if (typeof fieldErrors === "object" && fieldErrors !== null) {
		for (const [field, message] of Object.entries(fieldErrors)) {
			if (typeof message === "string") parts.push(`${field}: ${message}`);
		}
	}
	return parts.length > 0 ? parts.join("; ") : body;
}

/** HTTP error from the Jira REST API. 5xx responses are retryable, other 4xx are not. */
export class JiraApiError extends ExternalCallError {
	/** Raw response body from Jira. */
	readonly responseBody: string;

	constructor(statusCode: number, responseBody: string, cause?: Error) {
		super(
			`Jira API error (${statusCode}): ${describeJiraErrorBody(responseBody)}`,
			"JIRA_API_ERROR",
			{ retryable: statusCode >= 500 || statusCode === 0, statusCode },
			cause,
		);
		this.responseBody = responseBody;
	}
}

/** Rate limit error (HTTP 429) from the Jira REST API. */
export class JiraRateLimitError extends ExternalCallError {
	constructor(retryAfterMs: number | null, cause?: Error) {
		super(
			retryAfterMs === null
				? "Jira rate limited"
				: `Jira rate limited, retry after ${retryAfterMs}ms`,
			"JIRA_RATE_LIMITED",
			{ retryable: true, statusCode: 429, retryAfterMs },
			cause,
		);
	}
}

/**
 * Credentials rejected (HTTP 401/403).
 *
 * Retryable: the token is re-read from configuration on every attempt, so
 * an operator fixing it lets pending jobs through.
 */
export class JiraAuthError extends ExternalCallError {
	readonly responseBody: string;

	constructor(statusCode: number, responseBody: string, cause?: Error) {
		super(
			`Jira rejected the credentials (${statusCode})`,
			"JIRA_AUTH_FAILED",
			{ retryable: true, statusCode },
			cause,
		);
		this.responseBody = responseBody;
	}
}

/** No response: DNS failure, refused connection, reset socket. */
export class JiraNetworkError extends ExternalCallError {
	constructor(message: string, cause?: Error) {
		super(`Jira request failed: ${message}`, "JIRA_NETWORK_ERROR", { retryable: true }, cause);
	}
}

/** The caller aborted the request before Jira answered. */
export class JiraAbortedError extends ExternalCallError {
	constructor(cause?: Error) {
		super("Jira request aborted", "JIRA_ABORTED", { retryable: true }, cause);
	}
}

/** Any error {@link JiraClient} returns. */
export type JiraError =
	| JiraApiError
	| JiraRateLimitError
	| JiraAuthError
	| JiraNetworkError
	| JiraAbortedError;
