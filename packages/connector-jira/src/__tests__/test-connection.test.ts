import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { testConnection } from "../test-connection";

const mockFetch = vi.fn<(...args: Parameters<typeof fetch>) => Promise<Response>>();

beforeEach(() => {
	mockFetch.mockReset();
	vi.stubGlobal("fetch", mockFetch);
});

afterEach(() => {
	vi.unstubAllGlobals();
});

const config = {
	baseUrl: "https://mycompany.atlassian.net",
	email: "bot@example.com",
	apiToken: "test-token",
};

describe("testConnection (Jira)", () => {
	it("returns the user when /myself succeeds", async () => {
		mockFetch.mockResolvedValueOnce(
			new Response(JSON.stringify({ accountId: "acc-1", displayName: "Sync Bot" }), { status: 200 }),
		);

		const result = await testConnection(config);

		expect(result.ok).toBe(true);
		if (result.ok) expect(result.value.displayName).toBe("Sync Bot");
		expect(mockFetch).toHaveBeenCalledOnce();
	});

	it("returns Err on bad credentials", async () => {
		mockFetch.mockResolvedValueOnce(new Response("Unauthorized", { status: 401 }));

		const result = await testConnection(config);

		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.code).toBe("JIRA_AUTH_FAILED");
	});

	it("returns Err on rate limit without retrying", async () => {
		mockFetch.mockResolvedValue(new Response("", { status: 429, headers: { "Retry-After": "0" } }));

		const result = await testConnection(config);

		expect(mockFetch).toHaveBeenCalledOnce();
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.code).toBe("JIRA_RATE_LIMITED");
	});
});
