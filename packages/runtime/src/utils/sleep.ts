import { setTimeout as delay } from "node:timers/promises";

/**
 * Waits `ms` unless `signal` aborts first. Resolves `false` when cut short.
 */
export const sleep = async (ms: number, signal?: AbortSignal): Promise<boolean> => {
	if (signal?.aborted) {
		return false;
	}
	try {
		await delay(ms, undefined, { signal });
		return true;
	} catch (error) {
		if (signal?.aborted) {
			return false;
		}
		throw error;
	}
};
