import { Ok, type Result } from "@tracklink/core";
import { JiraClient } from "./client";
import type { JiraError } from "./errors";
import type { JiraConnectorConfig, JiraUser } from "./types";

/**
 * Test a Jira Cloud connection by authenticating and fetching the current user.
 *
 * Creates a `JiraClient` internally and calls `GET /rest/api/3/myself`.
 */
export async function testConnection(
	config: JiraConnectorConfig,
): Promise<Result<JiraUser, JiraError>> {
	const client = new JiraClient(config);
	const result = await client.getCurrentUser();
	if (!result.ok) return result;
	return Ok(result.value);
}
