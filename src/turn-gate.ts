// Interleave Turn Gate
// Binary signal a worker waits on until another worker hands it the floor

/**
 * A closed-by-default binary semaphore with a single waiter.
 *
 * `release()` either wakes the waiter or leaves one permit behind; a second
 * release before the permit is consumed does not add another one.
 */
export class TurnGate {
	private permit = false;
	private waiter: (() => void) | undefined;

	get isOpen(): boolean {
		return this.permit;
	}

	get hasWaiter(): boolean {
		return this.waiter !== undefined;
	}

	/**
	 * Resolve once the gate is open, consuming the permit
	 */
	acquire(): Promise<void> {
		if (this.permit) {
			this.permit = false;
			return Promise.resolve();
		}
		if (this.waiter !== undefined) {
			return Promise.reject(new Error("Turn gate already has a waiter"));
		}
		return new Promise<void>((resolve) => {
			this.waiter = resolve;
		});
	}

	release(): void {
		const waiter = this.waiter;
		if (waiter === undefined) {
			this.permit = true;
			return;
		}
		this.waiter = undefined;
		waiter();
	}
}
