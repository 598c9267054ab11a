import { unwrapOrThrow } from "@tracklink/core";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { SqliteSyncJobStore } from "../sqlite-job-store";
import { START } from "./helpers";
import { describeJobStoreContract } from "./store-contract";

describeJobStoreContract("SqliteSyncJobStore", () => new SqliteSyncJobStore(":memory:"));

describe("SqliteSyncJobStore on disk", () => {
	const dirs: string[] = [];

	afterEach(() => {
		for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
	});

	it("keeps jobs across reopen and shares the claim between handles", async () => {
		const dir = mkdtempSync(join(tmpdir(), "tracklink-"));
		dirs.push(dir);
		const path = join(dir, "jobs.db");
		const subject = { projectId: "proj-1", title: "Crash on save", description: "Trace attached" };

		const first = new SqliteSyncJobStore(path);
		const second = new SqliteSyncJobStore(path);
		expect(unwrapOrThrow(await first.insertIfAbsent({ objectId: "7", subject, now: START }))).not.toBeNull();
		expect(unwrapOrThrow(await second.insertIfAbsent({ objectId: "7", subject, now: START }))).toBeNull();
		await first.close();
		await second.close();

		const reopened = new SqliteSyncJobStore(path);
		const job = unwrapOrThrow(await reopened.get("7"));
		expect(job?.subject).toEqual(subject);
		expect(job?.state).toBe("pending");
		await reopened.close();
	});

	it("wraps driver failures in a JobStoreError", async () => {
		const store = new SqliteSyncJobStore(":memory:");
		await store.close();

		const result = await store.get("7");
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.code).toBe("JOB_STORE_ERROR");
			expect(result.error.message).toBe("Failed to get sync job");
		}
	});
});
