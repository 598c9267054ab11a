import { unwrapOrThrow } from "@tracklink/core";
import { describe, expect, it } from "vitest";
import { MemoryHostPersistence } from "../host-persistence";
import { creationNote, StateWriter } from "../state-writer";
import { captureLogs } from "./helpers";

describe("StateWriter", () => {
	it("writes the key and the creation note in one host call", async () => {
		const host = new MemoryHostPersistence();
		const writer = new StateWriter(host, captureLogs().logger);

		expect(await writer.commit("42", "ABC-123")).toEqual({ ok: true, value: undefined });
		expect(host.externalKeyOf("42")).toBe("ABC-123");
		expect(host.notesOf("42")).toEqual([creationNote("ABC-123")]);
		expect(creationNote("ABC-123")).toBe("External issue created: ABC-123");
	});

	it("leaves the object untouched when the host rejects the commit", async () => {
		const host = new MemoryHostPersistence();
		host.failNext("commit", new Error("deadlock detected"));
		const writer = new StateWriter(host, captureLogs().logger);

		const result = await writer.commit("42", "ABC-123");
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.code).toBe("LOCAL_COMMIT_FAILED");
			expect(result.error.message).toBe("Failed to record ABC-123 on 42: deadlock detected");
			expect(result.error.cause?.message).toBe("deadlock detected");
		}
		expect(host.externalKeyOf("42")).toBeNull();
		expect(host.notesOf("42")).toEqual([]);
	});

	it("treats a blank host key as no key", async () => {
		const host = new MemoryHostPersistence();
		const writer = new StateWriter(host, captureLogs().logger);
		expect(unwrapOrThrow(await writer.currentExternalKey("42"))).toBeNull();

		host.seed("42", "  ");
		expect(unwrapOrThrow(await writer.currentExternalKey("42"))).toBeNull();

		host.seed("42", "ABC-5");
		expect(unwrapOrThrow(await writer.currentExternalKey("42"))).toBe("ABC-5");
	});

	it("reports a failed key lookup", async () => {
		const host = new MemoryHostPersistence();
		host.failNext("read");
		const result = await new StateWriter(host, captureLogs().logger).currentExternalKey("42");
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.message).toBe("Failed to read external key of 42: host read failed");
	});

	it("logs instead of throwing when a failure note cannot be written", async () => {
		const host = new MemoryHostPersistence();
		host.failNext("note");
		const { logger, lines } = captureLogs();

		await expect(new StateWriter(host, logger).annotateFailure("42", "External issue creation failed: x")).resolves.toBeUndefined();
		expect(lines).toEqual([
			expect.objectContaining({
				level: "warn",
				msg: "failed to append failure note",
				objectId: "42",
				error: "host note failed",
			}),
		]);
	});
});
