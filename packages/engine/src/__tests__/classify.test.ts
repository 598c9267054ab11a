import { ConfigurationError, ExternalCallError, JobStoreError, LocalCommitError, TimeoutError } from "@tracklink/core";
import { describe, expect, it } from "vitest";
import { classifyFailure, describeFailure } from "../classify";

describe("classifyFailure", () => {
	it("follows the connector's retryable flag and keeps Retry-After", () => {
		const limited = new ExternalCallError("rate limited", "JIRA_RATE_LIMITED", {
			retryable: true,
			statusCode: 429,
			retryAfterMs: 2_000,
		});
		expect(classifyFailure(limited, "external_call")).toEqual({
			kind: "transient",
			stage: "external_call",
			code: "JIRA_RATE_LIMITED",
			message: "rate limited",
			retryAfterMs: 2_000,
		});

		const rejected = new ExternalCallError("bad field", "JIRA_API_ERROR", { retryable: false, statusCode: 400 });
		expect(classifyFailure(rejected, "external_call").kind).toBe("permanent");
	});

	it("treats timeouts, configuration, commit and store failures as transient", () => {
		expect(classifyFailure(new TimeoutError("call", 5), "external_call")).toMatchObject({
			kind: "transient",
			code: "TIMEOUT",
		});
		expect(classifyFailure(new ConfigurationError("missing"), "configuration")).toMatchObject({
			kind: "transient",
			stage: "configuration",
			code: "CONFIGURATION",
		});
		expect(classifyFailure(new LocalCommitError("locked"), "external_call")).toMatchObject({
			kind: "transient",
			stage: "local_commit",
		});
		expect(classifyFailure(new JobStoreError("gone"), "store").kind).toBe("transient");
	});

	it("describes a failure with its code", () => {
		const failure = classifyFailure(new LocalCommitError("row locked"), "local_commit");
		expect(describeFailure(failure)).toBe("[LOCAL_COMMIT_FAILED] row locked");
	});
});
