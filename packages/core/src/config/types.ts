// ---------------------------------------------------------------------------
// Sync configuration: raw provider values and the validated snapshot
// ---------------------------------------------------------------------------

/** Keys every configuration provider is read for. */
export const SETTING_KEYS = [
	"enabled",
	"acceptedStatusId",
	"roleId",
	"baseUrl",
	"projectKey",
	"issueType",
	"email",
	"apiToken",
	"summaryTemplate",
] as const;

/** A single key from {@link SETTING_KEYS}. */
export type SettingKey = (typeof SETTING_KEYS)[number];

/** Unvalidated values as the provider returns them. */
export type RawSettings = Partial<Record<SettingKey, string | boolean | undefined>>;

/**
 * Read-only source of settings, owned by the host's admin UI.
 *
 * `read()` is called once per trigger evaluation and once per job attempt,
 * so implementations should return current values rather than cache.
 */
export interface ConfigurationProvider {
	read(): RawSettings;
}

/** Immutable, validated snapshot of the provider's values. */
export interface SyncConfiguration {
	readonly enabled: boolean;
	/** Status identifier whose entry fires the trigger. */
	readonly acceptedStatusId: string;
	/** Role the acting user must hold in the object's project. */
	readonly roleId: string;
	/** External tracker base URL, without a trailing slash. */
	readonly baseUrl: string;
	readonly projectKey: string;
	readonly issueType: string;
	readonly email: string;
	readonly apiToken: string;
	/** Summary with `{id}`, `{title}` and `{project}` placeholders. */
	readonly summaryTemplate: string;
}
