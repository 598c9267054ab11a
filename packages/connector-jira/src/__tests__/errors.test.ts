import { ExternalCallError, TrackLinkError } from "@tracklink/core";
import { describe, expect, it } from "vitest";
import { describeJiraErrorBody, JiraApiError, JiraRateLimitError } from "../errors";

describe("describeJiraErrorBody", () => {
	it("joins error messages and field errors", () => {
		const body = JSON.stringify({
			errorMessages: ["Issue type is invalid"],
			errors: { summary: "Field is required" },
		});
		expect(describeJiraErrorBody(body)).toBe("Issue type is invalid; summary: Field is required");
	});

	it("returns non-JSON bodies unchanged", () => {
		expect(describeJiraErrorBody("Bad Gateway")).toBe("Bad Gateway");
	});

	it("returns JSON without known keys unchanged", () => {
		expect(describeJiraErrorBody('{"message":"x"}')).toBe('{"message":"x"}');
	});
});

describe("Jira errors", () => {
	it("derive from the shared error hierarchy", () => {
		const err = new JiraApiError(400, "bad");
		expect(err).toBeInstanceOf(ExternalCallError);
		expect(err).toBeInstanceOf(TrackLinkError);
		expect(err.responseBody).toBe("bad");
	});

	it("describe a rate limit without a Retry-After header", () => {
		const err = new JiraRateLimitError(null);
		expect(err.message).toBe("Jira rate limited");
		expect(err.retryAfterMs).toBeNull();
	});
});
