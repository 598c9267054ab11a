import { loadSyncConfiguration } from "@tracklink/core";
import { testConnection } from "@tracklink/connector-jira";
import { resolveConfigurationProvider } from "../config";
import { fatal, print, warn } from "../output";

/**
 * Validate the sync settings and authenticate against Jira with them.
 *
 * Usage: tracklink check [--config <file.json>]
 */
export async function check(flags: Record<string, string>): Promise<void> {
	const provider = resolveConfigurationProvider(flags);
	const loaded = loadSyncConfiguration(provider.read());
	if (!loaded.ok) fatal(loaded.error.message);

	const config = loaded.value;
	if (!config.enabled) warn("Sync is disabled; no events will be acted on.");
	print(`Configuration valid for project ${config.projectKey} (issue type ${config.issueType}).`);

	const result = await testConnection({
		baseUrl: config.baseUrl,
		email: config.email,
		apiToken: config.apiToken,
	});
	if (!result.ok) fatal(`Jira connection failed: ${result.error.message}`);

	print(`Authenticated as ${result.value.displayName} (${result.value.accountId}).`);
}
