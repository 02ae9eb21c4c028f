import { CancelledError, Err, type Result, TimeoutExceededError } from "@silverline/core";

/**
 * Run one pipeline step under a time budget.
 *
 * `run` receives a signal that is aborted when the budget runs out or when
 * `parent` is aborted. Either way the returned promise settles at once with
 * TimeoutExceededError or CancelledError. A step that ignores its signal keeps
 * running; its promise is then handed to `onAbandoned` so the caller can wait
 * for it before touching what the step was writing.
 *
 * @param step - Step name used in the timeout error (`locate`, `load`, ...).
 * @param timeoutMs - Budget in milliseconds.
 * @param parent - Run-wide cancellation signal, if any.
 */
export async function withTimeout<T, E>(
	step: string,
	timeoutMs: number,
	parent: AbortSignal | undefined,
	run: (signal: AbortSignal) => Promise<Result<T, E>>,
	onAbandoned?: (pending: Promise<Result<T, E>>) => void,
): Promise<Result<T, E | TimeoutExceededError | CancelledError>> {
	if (parent?.aborted) return Err(new CancelledError());

	const controller = new AbortController();
	let timer: ReturnType<typeof setTimeout> | undefined;
	let onParentAbort: (() => void) | undefined;

	const interrupted = new Promise<Result<never, TimeoutExceededError | CancelledError>>((resolve) => {
		timer = setTimeout(() => {
			resolve(Err(new TimeoutExceededError(step, timeoutMs)));
			controller.abort();
		}, timeoutMs);
		onParentAbort = () => {
			resolve(Err(new CancelledError()));
			controller.abort();
		};
		parent?.addEventListener("abort", onParentAbort, { once: true });
	});

	const running = run(controller.signal);

	try {
		const first = await Promise.race([
			running.then((result) => ({ finished: true as const, result })),
			interrupted.then((result) => ({ finished: false as const, result })),
		]);
		if (!first.finished) onAbandoned?.(running);
		return first.result;
	} finally {
		clearTimeout(timer);
		if (onParentAbort) parent?.removeEventListener("abort", onParentAbort);
	}
}

/**
 * Wait up to `graceMs` for every promise in `pending` to settle.
 * Resolves true when they all did, false when the grace period ran out first.
 */
export async function settleWithin(pending: Array<Promise<unknown>>, graceMs: number): Promise<boolean> {
	if (pending.length === 0) return true;

	let timer: ReturnType<typeof setTimeout> | undefined;
	const expired = new Promise<boolean>((resolve) => {
		timer = setTimeout(() => resolve(false), graceMs);
	});

	try {
		return await Promise.race([Promise.allSettled(pending).then(() => true), expired]);
	} finally {
		clearTimeout(timer);
	}
}
