// Interleave Trace Formatting
// Readable rendering of the scheduling events recorded by a run

import { exhaustive } from "./errors.js";
import type { TraceEvent } from "./types.js";

export function formatTraceEvent(event: TraceEvent): string {
	switch (event.kind) {
	case "launch":
		return `launch -> #${event.to}`;
	case "handoff":
		return (
			`#${event.from} -> #${event.to} at step ${event.step}` +
			(event.terminal ? " (terminal)" : "")
		);
	case "skip":
		return `#${event.worker} keeps the floor at step ${event.step}`;
	case "finish":
		return `#${event.worker} ${event.outcome}`;
	default:
		return exhaustive(event);
	}
}

/**
 * One line per event, in recording order
 */
export function formatTrace(events: readonly TraceEvent[]): string {
	return events.map(formatTraceEvent).join("\n");
}
