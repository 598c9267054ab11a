import type { ExternalIssueClient, SyncConfiguration } from "@tracklink/core";
import { JiraClient } from "./client";

export { JiraClient, parseRetryAfter } from "./client";
export {
	describeJiraErrorBody,
	JiraAbortedError,
	JiraApiError,
	JiraAuthError,
	type JiraError,
	JiraNetworkError,
	JiraRateLimitError,
} from "./errors";
export { buildCreateIssuePayload, textToAdf } from "./mapping";
export { testConnection } from "./test-connection";
export type {
	AdfDocument,
	AdfNode,
	JiraConnectorConfig,
	JiraCreateIssuePayload,
	JiraUser,
} from "./types";

/**
 * Client factory for the sync engine.
 *
 * Credentials come from the configuration snapshot of the current attempt,
 * so a rotated token applies to the next retry.
 */
export function jiraClientFactory(
	options: { fetchFn?: typeof fetch } = {},
): (cfg: SyncConfiguration) => ExternalIssueClient {
	return (cfg) =>
		new JiraClient({
			baseUrl: cfg.baseUrl,
			email: cfg.email,
			apiToken: cfg.apiToken,
			fetchFn: options.fetchFn,
		});
}
