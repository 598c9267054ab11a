import { unwrapOrThrow } from "@tracklink/core";
import { afterEach, describe, expect, it, vi } from "vitest";
import { SqliteSyncJobStore } from "../sqlite-job-store";
import { createTestEngine, developer, externalError, fails, makeObject } from "./helpers";

describe("SyncWorkerPool", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("drains every claimed object exactly once across workers", async () => {
		const env = createTestEngine({
			options: { concurrency: 3, batchSize: 2 },
			store: new SqliteSyncJobStore(":memory:"),
		});
		for (let i = 1; i <= 7; i++) {
			const outcome = await env.engine.onObjectSaved(
				makeObject({ id: String(i), statusId: "new" }),
				makeObject({ id: String(i) }),
				developer,
			);
			expect(outcome.status).toBe("claimed");
		}

		const pool = env.engine.createWorkerPool();
		expect(pool.size).toBe(3);
		expect(await pool.drain()).toBe(7);

		expect(env.client.requests).toHaveLength(7);
		const counts = unwrapOrThrow(await env.engine.countJobs());
		expect(counts.succeeded).toBe(7);
		for (let i = 1; i <= 7; i++) {
			expect(env.host.notesOf(String(i))).toHaveLength(1);
		}
		await env.store.close();
	});

	it("leaves jobs scheduled for later out of a drain", async () => {
		const env = createTestEngine();
		env.client.reply(fails(externalError(503, true)));
		await env.engine.onObjectSaved(makeObject({ statusId: "new" }), makeObject(), developer);

		const pool = env.engine.createWorkerPool();
		expect(await pool.drain()).toBe(1);
		expect(unwrapOrThrow(await env.engine.countJobs()).failed_retryable).toBe(1);
	});

	it("polls on an interval once started and stops cleanly", async () => {
		vi.useFakeTimers();
		const env = createTestEngine({ options: { pollIntervalMs: 1_000 } });
		const pool = env.engine.createWorkerPool();

		pool.start();
		expect(pool.isRunning).toBe(true);
		await vi.advanceTimersByTimeAsync(0);

		await env.engine.onObjectSaved(makeObject({ statusId: "new" }), makeObject(), developer);
		expect(env.client.requests).toHaveLength(0);

		await vi.advanceTimersByTimeAsync(1_000);
		// stop() waits for the poll the timer started.
		await pool.stop();
		expect(pool.isRunning).toBe(false);
		expect(env.client.requests).toHaveLength(1);
		expect(env.host.externalKeyOf("42")).toBe("ABC-123");
		expect(env.logs.map((l) => l.msg)).toContain("worker pool stopped");
	});
});
