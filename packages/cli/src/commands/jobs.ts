import { isSyncJobState, SYNC_JOB_STATES, type SyncJob } from "@tracklink/core";
import { requeueTerminalJob, type SyncJobStore } from "@tracklink/engine";
import { openStore, resolveStoreTarget } from "../config";
import { fatal, formatTime, print, printTable } from "../output";

async function withStore(
	flags: Record<string, string>,
	fn: (store: SyncJobStore) => Promise<void>,
): Promise<void> {
	const target = resolveStoreTarget(flags);
	if (!target) {
		fatal("No job store. Pass --sqlite <path> or --pg <url>, or set TRACKLINK_SQLITE_PATH.");
	}

	const store = await openStore(target);
	try {
		await fn(store);
	} finally {
		await store.close();
	}
}

/**
 * List sync jobs, most recently updated first.
 *
 * Usage: tracklink jobs list [--state <state>] [--limit <n>]
 */
export async function jobsList(flags: Record<string, string>): Promise<void> {
	const state = flags.state;
	if (state !== undefined && !isSyncJobState(state)) {
		fatal(`Unknown state "${state}". Expected one of: ${SYNC_JOB_STATES.join(", ")}`);
	}

	let limit: number | undefined;
	if (flags.limit !== undefined) {
		limit = Number(flags.limit);
		if (!Number.isInteger(limit) || limit <= 0) {
			fatal(`--limit must be a positive integer, got "${flags.limit}"`);
		}
	}

	await withStore(flags, async (store) => {
		const result = await store.list({ state, limit });
		if (!result.ok) fatal(result.error.message);

		if (result.value.length === 0) {
			print("No sync jobs found.");
			return;
		}

		printTable(
			result.value.map((job) => ({
				OBJECT: job.objectId,
				STATE: job.state,
				ATTEMPTS: job.attempts,
				EXTERNAL_KEY: job.externalKey ?? "-",
				NEXT_ELIGIBLE: formatTime(job.nextEligibleAt),
				LAST_ERROR: job.lastError ?? "",
			})),
		);
	});
}

/**
 * Show one job in full.
 *
 * Usage: tracklink jobs show <objectId>
 */
export async function jobsShow(flags: Record<string, string>, positional: string[]): Promise<void> {
	const objectId = positional[0];
	if (!objectId) fatal("Usage: tracklink jobs show <objectId>");

	await withStore(flags, async (store) => {
		const result = await store.get(objectId);
		if (!result.ok) fatal(result.error.message);
		if (!result.value) fatal(`No sync job for ${objectId}`);
		print(JSON.stringify(describeJob(result.value), null, 2));
	});
}

/**
 * Send a Failed-Terminal job back to the queue.
 *
 * Usage: tracklink jobs requeue <objectId>
 */
export async function jobsRequeue(flags: Record<string, string>, positional: string[]): Promise<void> {
	const objectId = positional[0];
	if (!objectId) fatal("Usage: tracklink jobs requeue <objectId>");

	await withStore(flags, async (store) => {
		const result = await requeueTerminalJob(store, objectId, Date.now());
		if (!result.ok) fatal(result.error.message);
		print(`Re-queued ${objectId} (version ${result.value.version}).`);
	});
}

function describeJob(job: SyncJob): Record<string, unknown> {
	return {
		objectId: job.objectId,
		state: job.state,
		attempts: job.attempts,
		externalKey: job.externalKey,
		lastError: job.lastError,
		lockedBy: job.lockedBy,
		lockedAt: job.lockedAt === null ? null : formatTime(job.lockedAt),
		nextEligibleAt: formatTime(job.nextEligibleAt),
		version: job.version,
		subject: job.subject,
		createdAt: formatTime(job.createdAt),
		claimedAt: formatTime(job.claimedAt),
		updatedAt: formatTime(job.updatedAt),
	};
}
