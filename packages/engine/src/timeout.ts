import { Err, Ok, type Result, TimeoutError } from "@tracklink/core";

/**
 * Run `fn` with a deadline.
 *
 * `fn` receives a signal that aborts when the deadline passes; callers that
 * cannot observe it are abandoned rather than awaited. Rejections of `fn`
 * propagate unchanged.
 */
export async function runWithTimeout<T>(
	operation: string,
	timeoutMs: number,
	fn: (signal: AbortSignal) => Promise<T>,
): Promise<Result<T, TimeoutError>> {
	const controller = new AbortController();
	let timer: ReturnType<typeof setTimeout> | undefined;

	const deadline = new Promise<Result<T, TimeoutError>>((resolve) => {
		timer = setTimeout(() => {
			controller.abort();
			resolve(Err(new TimeoutError(operation, timeoutMs)));
		}, timeoutMs);
	});

	try {
		return await Promise.race([fn(controller.signal).then((value) => Ok(value)), deadline]);
	} finally {
		clearTimeout(timer);
	}
}
