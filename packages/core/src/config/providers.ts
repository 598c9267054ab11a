import { existsSync, readFileSync } from "node:fs";
import { type ConfigurationProvider, type RawSettings, SETTING_KEYS, type SettingKey } from "./types";

/** Provider over a fixed set of values. Useful for embedding and tests. */
export class StaticConfigurationProvider implements ConfigurationProvider {
	private settings: RawSettings;

	constructor(settings: RawSettings) {
		this.settings = { ...settings };
	}

	read(): RawSettings {
		return { ...this.settings };
	}

	/** Replace individual values, as an admin saving the settings page would. */
	update(patch: RawSettings): void {
		this.settings = { ...this.settings, ...patch };
	}
}

/** Environment variable name for a setting key: `summaryTemplate` → `TRACKLINK_SUMMARY_TEMPLATE`. */
export function envVarName(key: SettingKey, prefix = "TRACKLINK_"): string {
	return `${prefix}${key.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toUpperCase()}`;
}

/** Provider over `TRACKLINK_*` environment variables, read on every call. */
export class EnvConfigurationProvider implements ConfigurationProvider {
	private readonly env: NodeJS.ProcessEnv;
	private readonly prefix: string;

	constructor(env: NodeJS.ProcessEnv = process.env, prefix = "TRACKLINK_") {
		this.env = env;
		this.prefix = prefix;
	}

	read(): RawSettings {
		const settings: RawSettings = {};
		for (const key of SETTING_KEYS) {
			const value = this.env[envVarName(key, this.prefix)];
			if (value !== undefined) settings[key] = value;
		}
		return settings;
	}
}

/**
 * Provider over a JSON file, re-read on every call so edits apply to the
 * next evaluation. A missing or unparseable file yields no settings, which
 * validation then reports key by key.
 */
export class JsonFileConfigurationProvider implements ConfigurationProvider {
	private readonly path: string;

	constructor(path: string) {
		this.path = path;
	}

	read(): RawSettings {
		if (!existsSync(this.path)) return {};
		let parsed: unknown;
		try {
			parsed = JSON.parse(readFileSync(this.path, "utf-8"));
		} catch {
			return {};
		}
		if (typeof parsed !== "object" || parsed === null) return {};

		const settings: RawSettings = {};
		for (const key of SETTING_KEYS) {
			const value: unknown = Reflect.get(parsed, key);
			if (typeof value === "string" || typeof value === "boolean") settings[key] = value;
		}
		return settings;
	}
}
