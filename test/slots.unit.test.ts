// Interleave Worker Slot Table Tests

import { describe, it } from "node:test";
import assert from "node:assert";
import { SlotTable, isActive } from "../src/slots.js";

describe("SlotTable", () => {
	it("should assign ordinals in registration order", () => {
		const table = new SlotTable();
		const a = table.register("a", new Set([1]));
		const b = table.register("b", new Set());

		assert.strictEqual(a.ordinal, 0);
		assert.strictEqual(b.ordinal, 1);
		assert.strictEqual(table.size, 2);
		assert.strictEqual(table.get(1), b);
		assert.strictEqual(table.get(2), undefined);
		assert.deepStrictEqual(table.all().map((s) => s.name), ["a", "b"]);
	});

	it("should register slots active, closed and at step 0", () => {
		const table = new SlotTable();
		const slot = table.register("a", new Set([0, 2]));

		assert.deepStrictEqual(slot.state, { kind: "active" });
		assert.strictEqual(slot.step, 0);
		assert.strictEqual(slot.gate.isOpen, false);
		assert.strictEqual(slot.pendingYield, undefined);
		assert.ok(slot.skips.has(2));
		assert.strictEqual(table.activeCount, 1);
		assert.ok(isActive(slot));
	});

	it("should refuse registration once sealed", () => {
		const table = new SlotTable();
		table.register("a", new Set());
		table.seal();

		assert.strictEqual(table.isSealed, true);
		assert.throws(
			() => table.register("b", new Set()),
			/Cannot register b: schedule is sealed/,
		);
		assert.strictEqual(table.size, 1);
	});

	it("should finish a slot exactly once", () => {
		const table = new SlotTable();
		const a = table.register("a", new Set());
		table.register("b", new Set());

		table.finish(a, { kind: "finished", outcome: "completed" });
		assert.strictEqual(table.activeCount, 1);
		assert.strictEqual(isActive(a), false);

		assert.throws(
			() => table.finish(a, { kind: "finished", outcome: "completed" }),
			/a has already finished/,
		);
		assert.strictEqual(table.activeCount, 1);
	});

	it("should keep the error of a failed slot", () => {
		const table = new SlotTable();
		const a = table.register("a", new Set());
		const error = new Error("boom");

		table.finish(a, { kind: "finished", outcome: "failed", error });

		assert.deepStrictEqual(a.state, { kind: "finished", outcome: "failed", error });
	});
});
