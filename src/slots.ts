// Interleave Worker Slot Table
// Ordered registry of workers; registration order is the rotation order

import { TurnGate } from "./turn-gate.js";
import type { SlotState, WorkerSlot } from "./types.js";

export class SlotTable {
	private readonly slots: WorkerSlot[] = [];
	private sealed = false;
	private active = 0;

	get size(): number {
		return this.slots.length;
	}

	get activeCount(): number {
		return this.active;
	}

	get isSealed(): boolean {
		return this.sealed;
	}

	/**
	 * Register a worker with a closed gate. The table must not be sealed.
	 */
	register(name: string, skips: ReadonlySet<number>): WorkerSlot {
		if (this.sealed) {
			throw new Error("Cannot register " + name + ": schedule is sealed");
		}
		const slot: WorkerSlot = {
			ordinal: this.slots.length,
			name,
			gate: new TurnGate(),
			skips,
			step: 0,
			state: { kind: "active" },
			pendingYield: undefined,
		};
		this.slots.push(slot);
		this.active++;
		return slot;
	}

	/**
	 * Fix the schedule. Called once, before any worker starts.
	 */
	seal(): void {
		this.sealed = true;
	}

	get(ordinal: number): WorkerSlot | undefined {
		return this.slots[ordinal];
	}

	all(): readonly WorkerSlot[] {
		return this.slots;
	}

	/**
	 * Move a slot to its finished state. Finishing twice is an error.
	 */
	finish(slot: WorkerSlot, state: Extract<SlotState, { kind: "finished" }>): void {
		if (slot.state.kind === "finished") {
			throw new Error(slot.name + " has already finished");
		}
		slot.state = state;
		this.active--;
	}
}

export function isActive(slot: WorkerSlot): boolean {
	return slot.state.kind === "active";
}
