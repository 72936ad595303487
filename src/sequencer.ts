// Interleave Turn Sequencer
// Cyclic cursor over the slot table that picks who gets the floor next

import { SchedulerError } from "./errors.js";
import { isActive, type SlotTable } from "./slots.js";
import type { WorkerSlot } from "./types.js";

export class TurnSequencer {
	// -1 means the walk is exhausted and restarts at the first slot
	private cursor = -1;

	constructor(private readonly table: SlotTable) {}

	get position(): number {
		return this.cursor;
	}

	/**
	 * Advance one position, wrapping at the end, whatever the slot's state
	 */
	advance(): WorkerSlot {
		const size = this.table.size;
		if (size === 0) {
			throw SchedulerError.noActiveWorker();
		}
		this.cursor = this.cursor + 1 >= size ? 0 : this.cursor + 1;
		const slot = this.table.get(this.cursor);
		if (!slot) {
			throw new Error(`Slot ${this.cursor} not found`);
		}
		return slot;
	}

	/**
	 * Advance until an active slot is found. Finished slots are passed over
	 * without taking a turn. Visits each slot at most once per call.
	 */
	nextActive(): WorkerSlot {
		if (this.table.activeCount === 0) {
			throw SchedulerError.noActiveWorker();
		}
		for (let visited = 0; visited < this.table.size; visited++) {
			const slot = this.advance();
			if (isActive(slot)) {
				return slot;
			}
		}
		throw SchedulerError.noActiveWorker();
	}
}
