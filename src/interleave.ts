// Interleave Yield Points
// Injects a yield point in front of calls into otherwise unaware code

import type { YieldPoint } from "./types.js";

/**
 * Wrap a function so that every call first awaits the yield point, then calls
 * through with the same arguments. Without a yield point the wrapper only
 * calls through, so production wiring and test wiring can share one code path.
 *
 * @example
 * const repo = {
 *   findById: interleave(store.findById.bind(store), scheduler.yieldPoint),
 *   save: interleave(store.save.bind(store), scheduler.yieldPoint),
 * };
 */
export function interleave<A extends unknown[], R>(
	fn: (...args: A) => R,
	yieldPoint?: YieldPoint,
): (...args: A) => Promise<Awaited<R>> {
	return async (...args: A): Promise<Awaited<R>> => {
		if (yieldPoint) {
			await yieldPoint();
		}
		return await fn(...args);
	};
}

/**
 * Run a yield point when one is given; a no-op otherwise.
 */
export async function yieldIfScheduled(yieldPoint?: YieldPoint): Promise<void> {
	if (yieldPoint) {
		await yieldPoint();
	}
}
