import { describe, expect, it } from "vitest";
import {
	ConfigurationError,
	Err,
	JobStoreError,
	LocalCommitError,
	Ok,
	TimeoutError,
	TrackLinkError,
	toError,
	unwrapOrThrow,
} from "../../result";

describe("Result", () => {
	it("Ok/Err have correct discriminants", () => {
		const ok = Ok(42);
		const err = Err(new TrackLinkError("fail", "TEST"));

		expect(ok.ok).toBe(true);
		if (ok.ok) expect(ok.value).toBe(42);
		expect(err.ok).toBe(false);
		if (!err.ok) expect(err.error).toBeInstanceOf(TrackLinkError);
	});

	it("unwrapOrThrow returns value on Ok, throws on Err", () => {
		expect(unwrapOrThrow(Ok(42))).toBe(42);
		expect(() => unwrapOrThrow(Err(new Error("boom")))).toThrow("boom");
	});
});

describe("errors", () => {
	it("all errors are instanceof TrackLinkError", () => {
		expect(new ConfigurationError("cfg")).toBeInstanceOf(TrackLinkError);
		expect(new JobStoreError("store")).toBeInstanceOf(TrackLinkError);
		expect(new LocalCommitError("commit")).toBeInstanceOf(TrackLinkError);
		expect(new TimeoutError("call", 10)).toBeInstanceOf(TrackLinkError);
	});

	it("error codes are correct strings", () => {
		expect(new ConfigurationError("").code).toBe("CONFIGURATION");
		expect(new JobStoreError("").code).toBe("JOB_STORE_ERROR");
		expect(new LocalCommitError("").code).toBe("LOCAL_COMMIT_FAILED");
		expect(new TimeoutError("call", 10).code).toBe("TIMEOUT");
	});

	it("names errors after their class", () => {
		expect(new LocalCommitError("x").name).toBe("LocalCommitError");
	});

	it("keeps the offending keys on ConfigurationError", () => {
		expect(new ConfigurationError("missing", ["baseUrl", "email"]).keys).toEqual([
			"baseUrl",
			"email",
		]);
	});

	it("formats the timeout message", () => {
		expect(new TimeoutError("Jira createIssue", 250).message).toBe(
			"Jira createIssue timed out after 250ms",
		);
	});

	it("toError wraps non-Error values", () => {
		const err = toError("plain");
		expect(err).toBeInstanceOf(Error);
		expect(err.message).toBe("plain");
	});
});
