// ---------------------------------------------------------------------------
// Jira Connector: Type Definitions
// ---------------------------------------------------------------------------

/** Connection configuration for a Jira Cloud site. */
export interface JiraConnectorConfig {
	/** Site base URL, e.g. `https://mycompany.atlassian.net`. */
	baseUrl: string;
	/** Email address for Basic auth. */
	email: string;
	/** API token paired with the email. */
	apiToken: string;
	/** Custom fetch function (for testing). Defaults to the global `fetch`. */
	fetchFn?: typeof fetch;
}

// ---------------------------------------------------------------------------
// Jira REST API v3: Minimal Request/Response Types
// ---------------------------------------------------------------------------

/** Atlassian Document Format node: only the subset this connector writes. */
export type AdfNode =
	| { type: "text"; text: string }
	| { type: "hardBreak" }
	| { type: "paragraph"; content: AdfNode[] };

/** Atlassian Document Format root. */
export interface AdfDocument {
	type: "doc";
	version: 1;
	content: AdfNode[];
}

/** Body of POST /rest/api/3/issue. */
export interface JiraCreateIssuePayload {
	fields: Record<string, unknown>;
}

/** Response of GET /rest/api/3/myself. */
export interface JiraUser {
	accountId: string;
	displayName: string;
	emailAddress?: string;
}
