import { AdapterError, Err, Ok, type Result } from "@silverline/core";

/** Normalise a caught value into an Error or undefined. */
export function toCause(error: unknown): Error | undefined {
	return error instanceof Error ? error : undefined;
}

/**
 * Execute an async operation and wrap errors into an AdapterError Result.
 * An AdapterError thrown by the operation is returned as is.
 */
export async function wrapAsync<T>(
	operation: () => Promise<T>,
	errorMessage: string,
): Promise<Result<T, AdapterError>> {
	try {
		const value = await operation();
		return Ok(value);
	} catch (error) {
		if (error instanceof AdapterError) {
			return Err(error);
		}
		const cause = toCause(error);
		const detail = cause ? `: ${cause.message}` : "";
		return Err(new AdapterError(`${errorMessage}${detail}`, cause));
	}
}

/** Throw an AdapterError when the signal has already fired. */
export function throwIfAborted(signal: AbortSignal | undefined, what: string): void {
	if (signal?.aborted) {
		throw new AdapterError(`${what} aborted`);
	}
}
