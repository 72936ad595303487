// Interleave Logger
// Debug-level logging, off unless NODE_DEBUG=interleave is set

import { debuglog } from "node:util";

export interface SchedulerLogger {
	debug(message: string, ...args: unknown[]): void;
}

export const DEBUG_SECTION = "interleave";

/**
 * Logger backed by util.debuglog; the section is enabled through NODE_DEBUG.
 */
export function createDebugLogger(section: string = DEBUG_SECTION): SchedulerLogger {
	const log = debuglog(section);
	return {
		debug(message, ...args) {
			log(message, ...args);
		},
	};
}

export const silentLogger: SchedulerLogger = {
	debug() {
		// discarded
	},
};
