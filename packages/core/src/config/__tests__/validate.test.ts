import { describe, expect, it } from "vitest";
import type { RawSettings } from "../types";
import { isExplicitlyDisabled, loadSyncConfiguration, parseBooleanSetting } from "../validate";

const complete: RawSettings = {
	enabled: "true",
	acceptedStatusId: "3",
	roleId: "5",
	baseUrl: "https://example.atlassian.net/",
	projectKey: "ABC",
	issueType: "Task",
	email: "bot@example.com",
	apiToken: "test-token",
	summaryTemplate: "[#{id}] {title}",
};

describe("loadSyncConfiguration", () => {
	it("accepts a complete configuration and strips the trailing slash", () => {
		const result = loadSyncConfiguration(complete);
		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value.enabled).toBe(true);
			expect(result.value.baseUrl).toBe("https://example.atlassian.net");
			expect(result.value.projectKey).toBe("ABC");
		}
	});

	it("returns a frozen snapshot", () => {
		const result = loadSyncConfiguration(complete);
		if (result.ok) expect(Object.isFrozen(result.value)).toBe(true);
	});

	it("accepts native booleans", () => {
		const result = loadSyncConfiguration({ ...complete, enabled: false });
		expect(result.ok).toBe(true);
		if (result.ok) expect(result.value.enabled).toBe(false);
	});

	it("reports every missing key", () => {
		const result = loadSyncConfiguration({ enabled: "yes", roleId: "5" });
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.code).toBe("CONFIGURATION");
			expect(result.error.keys).toEqual([
				"acceptedStatusId",
				"baseUrl",
				"projectKey",
				"issueType",
				"email",
				"apiToken",
				"summaryTemplate",
			]);
		}
	});

	it("does not default the enabled flag", () => {
		const { enabled: _omit, ...rest } = complete;
		const result = loadSyncConfiguration(rest);
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.keys).toEqual(["enabled"]);
	});

	it("treats whitespace-only values as missing", () => {
		const result = loadSyncConfiguration({ ...complete, projectKey: "   " });
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.message).toContain("projectKey is required");
	});

	it("rejects a non-http base URL", () => {
		const result = loadSyncConfiguration({ ...complete, baseUrl: "ftp://example.com" });
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.keys).toEqual(["baseUrl"]);
	});

	it("rejects a template without placeholders", () => {
		const result = loadSyncConfiguration({ ...complete, summaryTemplate: "Accepted issue" });
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.keys).toEqual(["summaryTemplate"]);
	});
});

describe("parseBooleanSetting", () => {
	it("parses common spellings", () => {
		expect(parseBooleanSetting("1")).toBe(true);
		expect(parseBooleanSetting("Off")).toBe(false);
		expect(parseBooleanSetting("maybe")).toBeUndefined();
		expect(parseBooleanSetting(undefined)).toBeUndefined();
	});
});

describe("isExplicitlyDisabled", () => {
	it("is true only for a recognised false value", () => {
		expect(isExplicitlyDisabled({ enabled: "0" })).toBe(true);
		expect(isExplicitlyDisabled({})).toBe(false);
		expect(isExplicitlyDisabled({ enabled: "true" })).toBe(false);
	});
});
