import { describe, expect, it } from "vitest";
import { parseArgs } from "../args";

describe("parseArgs", () => {
	it("parses a single-word command", () => {
		const result = parseArgs(["node", "tracklink", "check"]);
		expect(result.command).toEqual(["check"]);
		expect(result.flags).toEqual({});
		expect(result.positional).toEqual([]);
	});

	it("parses jobs subcommands as two-word commands", () => {
		expect(parseArgs(["node", "tracklink", "jobs", "list"]).command).toEqual(["jobs", "list"]);
		expect(parseArgs(["node", "tracklink", "jobs", "show", "42"]).command).toEqual(["jobs", "show"]);
		expect(parseArgs(["node", "tracklink", "jobs", "requeue", "42"]).command).toEqual([
			"jobs",
			"requeue",
		]);
	});

	it("keeps an unknown second word as a positional", () => {
		const result = parseArgs(["node", "tracklink", "jobs", "purge"]);
		expect(result.command).toEqual(["jobs"]);
		expect(result.positional).toEqual(["purge"]);
	});

	it("parses --flag value and --flag=value", () => {
		const result = parseArgs([
			"node",
			"tracklink",
			"jobs",
			"list",
			"--state",
			"failed_terminal",
			"--sqlite=/tmp/jobs.db",
		]);
		expect(result.flags).toEqual({ state: "failed_terminal", sqlite: "/tmp/jobs.db" });
	});

	it("treats a trailing flag as boolean", () => {
		const result = parseArgs(["node", "tracklink", "--help"]);
		expect(result.command).toEqual([]);
		expect(result.flags.help).toBe("true");
	});

	it("parses short flags", () => {
		const result = parseArgs(["node", "tracklink", "-v"]);
		expect(result.flags.v).toBe("true");
	});

	it("collects positionals mixed with flags", () => {
		const result = parseArgs(["node", "tracklink", "jobs", "show", "--pg", "postgres://db", "42"]);
		expect(result.command).toEqual(["jobs", "show"]);
		expect(result.flags.pg).toBe("postgres://db");
		expect(result.positional).toEqual(["42"]);
	});

	it("returns empty results for no arguments", () => {
		expect(parseArgs(["node", "tracklink"])).toEqual({ command: [], flags: {}, positional: [] });
	});
});
