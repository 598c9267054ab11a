import { ConfigurationError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";
import { hasPlaceholder } from "../summary";
import type { RawSettings, SettingKey, SyncConfiguration } from "./types";

const TRUE_VALUES = new Set(["true", "1", "yes", "on"]);
const FALSE_VALUES = new Set(["false", "0", "no", "off"]);

/** String settings that must be present and non-empty. */
const REQUIRED_STRINGS = [
	"acceptedStatusId",
	"roleId",
	"baseUrl",
	"projectKey",
	"issueType",
	"email",
	"apiToken",
	"summaryTemplate",
] as const satisfies ReadonlyArray<SettingKey>;

/** Parse a boolean setting. Returns `undefined` when absent or unrecognised. */
export function parseBooleanSetting(value: string | boolean | undefined): boolean | undefined {
	if (typeof value === "boolean") return value;
	if (value === undefined) return undefined;
	const lower = value.trim().toLowerCase();
	if (TRUE_VALUES.has(lower)) return true;
	if (FALSE_VALUES.has(lower)) return false;
	return undefined;
}

/**
 * Whether the raw settings switch sync off explicitly.
 *
 * A disabled integration usually has no credentials filled in, so callers
 * check this before {@link loadSyncConfiguration} to avoid reporting the
 * missing values of a feature nobody turned on.
 */
export function isExplicitlyDisabled(raw: RawSettings): boolean {
	return parseBooleanSetting(raw.enabled) === false;
}

/**
 * Validate raw provider values into an immutable {@link SyncConfiguration}.
 *
 * No defaults are assumed: every key is required. All problems are
 * collected into a single {@link ConfigurationError} whose `keys` list the
 * offending settings in declaration order.
 */
export function loadSyncConfiguration(
	raw: RawSettings,
): Result<SyncConfiguration, ConfigurationError> {
	const problems: string[] = [];
	const keys: SettingKey[] = [];

	const enabled = parseBooleanSetting(raw.enabled);
	if (enabled === undefined) {
		problems.push("enabled must be a boolean");
		keys.push("enabled");
	}

	const values: Partial<Record<(typeof REQUIRED_STRINGS)[number], string>> = {};
	for (const key of REQUIRED_STRINGS) {
		const value = raw[key];
		if (typeof value !== "string" || value.trim().length === 0) {
			problems.push(`${key} is required`);
			keys.push(key);
			continue;
		}
		values[key] = value.trim();
	}

	if (values.baseUrl !== undefined) {
		if (!/^https?:\/\/[^/\s]+/i.test(values.baseUrl)) {
			problems.push("baseUrl must be an http(s) URL");
			keys.push("baseUrl");
		} else {
			values.baseUrl = values.baseUrl.replace(/\/+$/, "");
		}
	}

	if (values.summaryTemplate !== undefined && !hasPlaceholder(values.summaryTemplate)) {
		problems.push("summaryTemplate must contain {id}, {title} or {project}");
		keys.push("summaryTemplate");
	}

	if (
		problems.length > 0 ||
		enabled === undefined ||
		values.acceptedStatusId === undefined ||
		values.roleId === undefined ||
		values.baseUrl === undefined ||
		values.projectKey === undefined ||
		values.issueType === undefined ||
		values.email === undefined ||
		values.apiToken === undefined ||
		values.summaryTemplate === undefined
	) {
		return Err(new ConfigurationError(`Invalid sync configuration: ${problems.join("; ")}`, keys));
	}

	return Ok(
		Object.freeze({
			enabled,
			acceptedStatusId: values.acceptedStatusId,
			roleId: values.roleId,
			baseUrl: values.baseUrl,
			projectKey: values.projectKey,
			issueType: values.issueType,
			email: values.email,
			apiToken: values.apiToken,
			summaryTemplate: values.summaryTemplate,
		}),
	);
}
