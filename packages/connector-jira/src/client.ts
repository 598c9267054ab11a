// ---------------------------------------------------------------------------
// JiraClient: HTTP wrapper for Jira Cloud REST API v3
// ---------------------------------------------------------------------------

import {
	type CreatedIssue,
	Err,
	type ExternalIssueClient,
	type ExternalIssueRequest,
	Ok,
	type Result,
	toError,
} from "@tracklink/core";
import {
	JiraAbortedError,
	JiraApiError,
	JiraAuthError,
	type JiraError,
	JiraNetworkError,
	JiraRateLimitError,
} from "./errors";
import { buildCreateIssuePayload } from "./mapping";
import type { JiraConnectorConfig, JiraUser } from "./types";

/**
 * HTTP client for the Jira Cloud REST API v3.
 *
 * Uses Basic authentication (email + API token). Every method makes
 * exactly one request: rate limits and server errors come back as
 * retryable errors for the caller to schedule, never as in-place retries.
 */
export class JiraClient implements ExternalIssueClient {
	private readonly baseUrl: string;
	private readonly authHeader: string;
	private readonly fetchFn: typeof fetch;

	constructor(config: JiraConnectorConfig) {
		this.baseUrl = config.baseUrl.replace(/\/+$/, "");
		this.authHeader = `Basic ${Buffer.from(`${config.email}:${config.apiToken}`).toString("base64")}`;
		this.fetchFn = config.fetchFn ?? ((input, init) => fetch(input, init));
	}

	/** Create an issue via `POST /rest/api/3/issue`. */
	async createIssue(
		request: ExternalIssueRequest,
		signal?: AbortSignal,
	): Promise<Result<CreatedIssue, JiraError>> {
		const result = await this.request("/rest/api/3/issue", "POST", signal, buildCreateIssuePayload(request));
		if (!result.ok) return result;

		const { status, data } = result.value;
		const key = readString(data, "key");
		if (key === undefined) {
			return Err(new JiraApiError(status, "Response did not include an issue key"));
		}
		return Ok({ key, id: readString(data, "id"), self: readString(data, "self") });
	}

	/** Fetch the authenticated user: the cheapest call that validates credentials. */
	async getCurrentUser(signal?: AbortSignal): Promise<Result<JiraUser, JiraError>> {
		const result = await this.request("/rest/api/3/myself", "GET", signal);
		if (!result.ok) return result;

		const { status, data } = result.value;
		const accountId = readString(data, "accountId");
		if (accountId === undefined) {
			return Err(new JiraApiError(status, "Response did not include an accountId"));
		}
		return Ok({
			accountId,
			displayName: readString(data, "displayName") ?? accountId,
			emailAddress: readString(data, "emailAddress"),
		});
	}

	// -----------------------------------------------------------------------
	// Internal HTTP helpers
	// -----------------------------------------------------------------------

	/** Make a single HTTP request and map the failure modes to typed errors. */
	private async request(
		path: string,
		method: "GET" | "POST",
		signal: AbortSignal | undefined,
		body?: unknown,
	): Promise<Result<{ status: number; data: unknown }, JiraError>> {
		const headers: Record<string, string> = {
			Authorization: this.authHeader,
			Accept: "application/json",
		};
		const init: RequestInit = { method, headers, signal };
		if (body !== undefined) {
			headers["Content-Type"] = "application/json";
			init.body = JSON.stringify(body);
		}

		let response: Response;
		try {
			response = await this.fetchFn(`${this.baseUrl}${path}`, init);
		} catch (error) {
			const cause = toError(error);
			if (signal?.aborted || cause.name === "AbortError") {
				return Err(new JiraAbortedError(cause));
			}
			return Err(new JiraNetworkError(cause.message, cause));
		}

		if (response.ok) {
			const text = await response.text();
			if (text.length === 0) return Ok({ status: response.status, data: null });
			try {
				return Ok({ status: response.status, data: JSON.parse(text) as unknown });
			} catch (error) {
				return Err(new JiraApiError(response.status, text, toError(error)));
			}
		}

		const responseBody = await response.text();

		if (response.status === 429) {
			return Err(new JiraRateLimitError(parseRetryAfter(response.headers.get("Retry-After"))));
		}
		if (response.status === 401 || response.status === 403) {
			return Err(new JiraAuthError(response.status, responseBody));
		}
		return Err(new JiraApiError(response.status, responseBody));
	}
}

/**
 * Parse a `Retry-After` header into milliseconds.
 *
 * Accepts delta-seconds or an HTTP date; returns `null` when absent or
 * unparseable.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | null {
	if (value === null || value.trim().length === 0) return null;
	const seconds = Number(value);
	if (Number.isFinite(seconds)) return Math.max(0, Math.round(seconds * 1000));
	const date = Date.parse(value);
	if (Number.isNaN(date)) return null;
	return Math.max(0, date - now);
}

function readString(data: unknown, key: string): string | undefined {
	if (typeof data !== "object" || data === null) return undefined;
	const value: unknown = Reflect.get(data, key);
	return typeof value === "string" ? value : undefined;
}
