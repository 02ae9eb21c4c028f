import type { RuntimeOverrides } from "./runtime";

/** Process-level inputs of a command, replaceable in tests */
export interface CommandContext extends RuntimeOverrides {
	env: Record<string, string | undefined>;
	now: Date;
	/** Aborted on SIGINT */
	signal?: AbortSignal;
}

export function processContext(signal?: AbortSignal): CommandContext {
	return { env: process.env, now: new Date(), signal };
}
