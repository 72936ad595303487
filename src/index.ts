// Interleave - deterministic interleaving scheduler for reproducing races
// Main exports

//==============================================================================
// Types
//==============================================================================

export type {
	NamedTask, ScheduleDefinition, SchedulerState, SkipSet, SlotState,
	Task, TaskBody, TraceEvent, Turn, WorkerSlot, YieldPoint,
} from "./types.js";

export type { ErrorCode, TaskFailure, ValidationError, ValidationResult } from "./errors.js";

export type { SchedulerLogger } from "./logger.js";

export type { SchedulerOptions } from "./scheduler.js";

//==============================================================================
// Scheduler
//==============================================================================

export { InterleavingScheduler, createInterleavingScheduler } from "./scheduler.js";

export { interleave, yieldIfScheduled } from "./interleave.js";

export { formatTrace, formatTraceEvent } from "./trace.js";

//==============================================================================
// Building Blocks
//==============================================================================

export { TurnGate } from "./turn-gate.js";

export { SlotTable, isActive } from "./slots.js";

export { TurnSequencer } from "./sequencer.js";

//==============================================================================
// Errors and Validation
//==============================================================================

export { ErrorCodes, SchedulerError, exhaustive } from "./errors.js";

export { invalidResult, validResult } from "./errors.js";

export { defaultWorkerName, validateSchedule } from "./validator.js";

//==============================================================================
// Logging
//==============================================================================

export { DEBUG_SECTION, createDebugLogger, silentLogger } from "./logger.js";
