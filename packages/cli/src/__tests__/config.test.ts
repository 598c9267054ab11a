import { EnvConfigurationProvider, JsonFileConfigurationProvider } from "@tracklink/core";
import { describe, expect, it } from "vitest";
import { resolveConfigurationProvider, resolveStoreTarget } from "../config";

describe("resolveStoreTarget", () => {
	it("prefers flags over the environment", () => {
		const target = resolveStoreTarget(
			{ sqlite: "/tmp/flag.db" },
			{ TRACKLINK_DATABASE_URL: "postgres://env" },
		);
		expect(target).toEqual({ kind: "sqlite", path: "/tmp/flag.db" });
	});

	it("accepts --pg", () => {
		expect(resolveStoreTarget({ pg: "postgres://localhost/tracklink" }, {})).toEqual({
			kind: "pg",
			connectionString: "postgres://localhost/tracklink",
		});
	});

	it("falls back to environment variables", () => {
		expect(resolveStoreTarget({}, { TRACKLINK_SQLITE_PATH: "/var/lib/jobs.db" })).toEqual({
			kind: "sqlite",
			path: "/var/lib/jobs.db",
		});
		expect(resolveStoreTarget({}, { TRACKLINK_DATABASE_URL: "postgres://env" })).toEqual({
			kind: "pg",
			connectionString: "postgres://env",
		});
	});

	it("ignores a bare flag and blank values", () => {
		expect(resolveStoreTarget({ sqlite: "true" }, { TRACKLINK_SQLITE_PATH: "  " })).toBeNull();
	});

	it("returns null when nothing is configured", () => {
		expect(resolveStoreTarget({}, {})).toBeNull();
	});
});

describe("resolveConfigurationProvider", () => {
	it("reads a JSON file when --config is given", () => {
		expect(resolveConfigurationProvider({ config: "/etc/tracklink.json" }, {})).toBeInstanceOf(
			JsonFileConfigurationProvider,
		);
	});

	it("reads TRACKLINK_* variables otherwise", () => {
		const provider = resolveConfigurationProvider({}, { TRACKLINK_PROJECT_KEY: "ABC" });
		expect(provider).toBeInstanceOf(EnvConfigurationProvider);
		expect(provider.read().projectKey).toBe("ABC");
	});
});
