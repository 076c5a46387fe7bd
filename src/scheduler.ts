import { setTimeout as delay } from "node:timers/promises";
import { DispatchCancelledError } from "./errors.js";

/** Time source and cancellable wait used by the dispatcher; swapped for a fake clock in tests */
export interface Scheduler {
	now(): number;
	sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemScheduler: Scheduler = {
	now: () => Date.now(),
	async sleep(ms, signal) {
		try {
			await delay(ms, undefined, { signal });
		} catch (err) {
			if (signal?.aborted) throw new DispatchCancelledError(signal.reason);
			throw err;
		}
	}
};

/** Uniform integer in `[min, max]`, like a dice roll */
export function randomInt(
	min: number,
	max: number,
	random: () => number = Math.random
): number {
	return min + Math.floor(random() * (max - min + 1));
}

export function formatWait(ms: number): string {
	const seconds = Math.ceil(ms / 1000);
	const minutes = Math.floor(seconds / 60);
	return `${minutes} minutes, ${seconds % 60} seconds`;
}
