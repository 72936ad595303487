// Interleave Scheduler
// Runs task bodies as concurrent workers in a deterministic round-robin order

import { AsyncLocalStorage } from "node:async_hooks";
import { SchedulerError, type TaskFailure } from "./errors.js";
import { createDebugLogger, type SchedulerLogger } from "./logger.js";
import { TurnSequencer } from "./sequencer.js";
import { SlotTable } from "./slots.js";
import { formatTrace } from "./trace.js";
import type {
	NamedTask,
	SchedulerState,
	SkipSet,
	Task,
	TraceEvent,
	Turn,
	WorkerSlot,
	YieldPoint,
} from "./types.js";
import { validateSchedule } from "./validator.js";

//==============================================================================
// Options
//==============================================================================

export interface SchedulerOptions {
	/** Receives debug output; defaults to util.debuglog("interleave") */
	logger?: SchedulerLogger;
	/** Prefix for log lines */
	name?: string;
}

//==============================================================================
// Interleaving Scheduler
//==============================================================================

/**
 * Lets only one worker run at any given time and passes the floor between
 * them in deterministic turns. Useful for reproducing race conditions.
 *
 * Every call to `next()` hands the floor to the next active worker in
 * registration order, unless the caller's current step is in its skip set.
 * A scheduler runs once; create a new one per run.
 *
 * @example
 * const scheduler = new InterleavingScheduler();
 * await scheduler.start([
 *   async (turn) => { trace.push("A1"); await turn.next(); trace.push("A2"); },
 *   async (turn) => { trace.push("B1"); await turn.next(); trace.push("B2"); },
 * ]);
 * // trace: A1, B1, A2, B2
 */
export class InterleavingScheduler {
	private readonly slots = new SlotTable();
	private readonly sequencer = new TurnSequencer(this.slots);
	private readonly context = new AsyncLocalStorage<WorkerSlot>();
	private readonly logger: SchedulerLogger;
	private readonly name: string;
	private readonly events: TraceEvent[] = [];
	private _state: SchedulerState = "idle";
	private holder: WorkerSlot | undefined;
	private loggerFailure: { error: unknown } | undefined;

	/**
	 * Yield point bound to this scheduler, for code that is not handed a Turn
	 */
	readonly yieldPoint: YieldPoint = () => this.next();

	constructor(options: SchedulerOptions = {}) {
		this.logger = options.logger ?? createDebugLogger();
		this.name = options.name ?? "scheduler";
	}

	get state(): SchedulerState {
		return this._state;
	}

	get trace(): readonly TraceEvent[] {
		return this.events;
	}

	/**
	 * Step counter of every worker, by ordinal
	 */
	get steps(): readonly number[] {
		return this.slots.all().map((slot) => slot.step);
	}

	/**
	 * Ordinal of the worker currently holding the floor
	 */
	get floor(): number | undefined {
		return this.holder?.ordinal;
	}

	/**
	 * Called by the orchestrating code to run every task and wait for all of
	 * them to finish.
	 *
	 * @param tasks Task bodies, one worker each, in rotation order
	 * @param skipSets For each worker, the steps (calls to next()) at which it
	 * keeps the floor. May be shorter than `tasks`.
	 * @throws SchedulerError InvalidSchedule, AlreadyStarted, or TaskFailed and
	 * LoggerFailed once every worker has finished
	 */
	async start(
		tasks: readonly Task[],
		skipSets: readonly (SkipSet | undefined)[] = [],
	): Promise<void> {
		if (this._state !== "idle") {
			throw SchedulerError.alreadyStarted();
		}
		const result = validateSchedule(tasks, skipSets);
		if (!result.valid || !result.value) {
			throw SchedulerError.invalidSchedule(result.errors);
		}
		this._state = "running";

		const { tasks: named, skipSets: skips } = result.value;
		const workers = named.map((task, ordinal) => {
			const slot = this.slots.register(task.name, skips[ordinal] ?? new Set<number>());
			this.log("registered %s with skip set [%s]", slot.name, [...slot.skips].join(", "));
			return { slot, task };
		});
		this.slots.seal();

		// All workers start blocked on their own gate
		const runs = workers.map(({ slot, task }) => this.runWorker(slot, task));

		const first = this.sequencer.nextActive();
		this.holder = first;
		this.events.push({ kind: "launch", to: first.ordinal });
		this.log("releasing %s", first.name);
		first.gate.release();

		const settled = await Promise.allSettled(runs);
		this._state = "done";
		this.holder = undefined;
		this.log("run complete:\n%s", formatTrace(this.events));

		for (const result of settled) {
			if (result.status === "rejected") {
				const reason: unknown = result.reason;
				throw reason;
			}
		}
		const failures = this.collectFailures();
		if (failures.length > 0) {
			throw SchedulerError.taskFailed(failures, this.slots.size);
		}
		if (this.loggerFailure) {
			throw SchedulerError.loggerFailed(this.loggerFailure.error);
		}
	}

	/**
	 * Gives the floor to the next worker and waits until another worker gives
	 * it back. Must be awaited, and only from within a running task body.
	 */
	async next(): Promise<void> {
		const slot = this.context.getStore();
		if (!slot) {
			throw SchedulerError.outsideWorker();
		}
		await this.checkedYield(slot);
	}

	//==========================================================================
	// Worker lifecycle
	//==========================================================================

	private async runWorker(slot: WorkerSlot, task: NamedTask): Promise<void> {
		this.log("%s waiting for its turn", slot.name);
		await slot.gate.acquire();
		this.log("%s started", slot.name);

		const turn = this.createTurn(slot);
		let failure: { error: unknown } | undefined;
		try {
			await this.context.run(slot, async () => {
				await task.run(turn);
			});
		} catch (error) {
			failure = { error };
		}

		// A next() the body did not await has already handed the floor on.
		// The slot stays active until that call gets the floor back.
		const pending = slot.pendingYield;
		if (pending) {
			this.log("%s settled with next() pending", slot.name);
			try {
				await pending;
			} catch (error) {
				failure ??= { error };
			}
		}

		if (failure) {
			this.log("%s failed: %s", slot.name, String(failure.error));
			this.slots.finish(slot, { kind: "finished", outcome: "failed", error: failure.error });
		} else {
			this.slots.finish(slot, { kind: "finished", outcome: "completed" });
		}
		this.events.push({
			kind: "finish",
			worker: slot.ordinal,
			outcome: failure ? "failed" : "completed",
		});
		this.log("%s finished", slot.name);

		// Hand the floor forward even though this worker never runs again
		await this.yieldFrom(slot, true);
	}

	private createTurn(slot: WorkerSlot): Turn {
		return {
			ordinal: slot.ordinal,
			name: slot.name,
			get step() {
				return slot.step;
			},
			next: () => this.checkedYield(slot),
		};
	}

	//==========================================================================
	// Yield protocol
	//==========================================================================

	private async checkedYield(slot: WorkerSlot): Promise<void> {
		if (slot.state.kind === "finished") {
			throw SchedulerError.workerFinished(slot.name);
		}
		if (slot.pendingYield) {
			throw SchedulerError.yieldNotAwaited(slot.name);
		}
		const pending = this.yieldFrom(slot, false);
		slot.pendingYield = pending;
		try {
			await pending;
		} finally {
			slot.pendingYield = undefined;
		}
	}

	/**
	 * The terminal call comes from a finished worker: it never consults the
	 * skip set and never waits.
	 */
	private async yieldFrom(slot: WorkerSlot, terminal: boolean): Promise<void> {
		const running = this.slots.activeCount;
		this.log("running workers: %d", running);
		if (running === 0) {
			this.holder = undefined;
			return;
		}

		const step = slot.step;
		if (!terminal && slot.skips.has(step)) {
			this.events.push({ kind: "skip", worker: slot.ordinal, step });
			this.log("%s keeps the floor at step %d", slot.name, step);
			slot.step++;
			return;
		}

		const target = this.sequencer.nextActive();
		this.events.push({
			kind: "handoff",
			from: slot.ordinal,
			to: target.ordinal,
			step,
			terminal,
		});
		this.log("%s releasing %s at step %d", slot.name, target.name, step);
		this.holder = target;
		target.gate.release();
		if (!terminal) {
			await slot.gate.acquire();
			this.log("%s has been released", slot.name);
		}
		slot.step++;
	}

	//==========================================================================
	// Helpers
	//==========================================================================

	private collectFailures(): TaskFailure[] {
		const failures: TaskFailure[] = [];
		for (const slot of this.slots.all()) {
			if (slot.state.kind === "finished" && slot.state.outcome === "failed") {
				failures.push({ ordinal: slot.ordinal, name: slot.name, error: slot.state.error });
			}
		}
		return failures;
	}

	private log(message: string, ...args: unknown[]): void {
		try {
			this.logger.debug("[" + this.name + "] " + message, ...args);
		} catch (error) {
			// Reported by start() once every worker has terminated
			this.loggerFailure ??= { error };
		}
	}
}

//==============================================================================
// Factory Functions
//==============================================================================

/**
 * Create an interleaving scheduler for a single run
 */
export function createInterleavingScheduler(
	options?: SchedulerOptions,
): InterleavingScheduler {
	return new InterleavingScheduler(options);
}
