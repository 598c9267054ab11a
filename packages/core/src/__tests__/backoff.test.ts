import { describe, expect, it } from "vitest";
import { computeBackoff } from "../backoff";

const policy = { baseDelayMs: 1_000, maxDelayMs: 10_000 };

describe("computeBackoff", () => {
	it("waits the base delay after the first failure", () => {
		expect(computeBackoff(1, policy)).toBe(1_000);
	});

	it("doubles with each failure", () => {
		expect([1, 2, 3, 4].map((n) => computeBackoff(n, policy))).toEqual([1_000, 2_000, 4_000, 8_000]);
	});

	it("caps at the maximum delay", () => {
		expect(computeBackoff(5, policy)).toBe(10_000);
		expect(computeBackoff(40, policy)).toBe(10_000);
	});

	it("treats zero attempts like the first", () => {
		expect(computeBackoff(0, policy)).toBe(1_000);
	});
});
