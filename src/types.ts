// Interleave Types
// Task, turn, slot and trace definitions shared by the scheduler modules

import type { TurnGate } from "./turn-gate.js";

//==============================================================================
// Tasks and Turns
//==============================================================================

/**
 * Runs the yield protocol for whoever holds it. The returned promise must be
 * awaited before the caller touches shared state again.
 */
export type YieldPoint = () => Promise<void>;

/**
 * Explicit handle given to every task body.
 */
export interface Turn {
	/** Registration index, which is also the rotation position */
	readonly ordinal: number;
	readonly name: string;
	/** Number of yield-protocol calls counted so far */
	readonly step: number;
	readonly next: YieldPoint;
}

/**
 * A unit of work run by one worker. Zero-argument functions are accepted too.
 */
export type TaskBody = (turn: Turn) => unknown;

export interface NamedTask {
	name: string;
	run: TaskBody;
}

export type Task = TaskBody | NamedTask;

/**
 * Step indices at which a worker keeps the floor instead of handing off.
 */
export type SkipSet = Iterable<number>;

//==============================================================================
// Worker Slots
//==============================================================================

export type SlotState =
	| { kind: "active" }
	| { kind: "finished"; outcome: "completed" }
	| { kind: "finished"; outcome: "failed"; error: unknown };

export interface WorkerSlot {
	readonly ordinal: number;
	readonly name: string;
	readonly gate: TurnGate;
	readonly skips: ReadonlySet<number>;
	step: number;
	state: SlotState;
	/** The non-terminal next() of this worker that has not resolved yet */
	pendingYield: Promise<void> | undefined;
}

//==============================================================================
// Schedule Definition
//==============================================================================

export interface ScheduleDefinition {
	tasks: readonly NamedTask[];
	skipSets: readonly ReadonlySet<number>[];
}

//==============================================================================
// Run Trace
//==============================================================================

export type TraceEvent =
	| { kind: "launch"; to: number }
	| { kind: "handoff"; from: number; to: number; step: number; terminal: boolean }
	| { kind: "skip"; worker: number; step: number }
	| { kind: "finish"; worker: number; outcome: "completed" | "failed" };

export type SchedulerState = "idle" | "running" | "done";
