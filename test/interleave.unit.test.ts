// Interleave Yield Point Wrapper Tests

import { describe, it } from "node:test";
import assert from "node:assert";
import { interleave, yieldIfScheduled } from "../src/interleave.js";

describe("interleave", () => {
	it("should call through with the same arguments without a yield point", async () => {
		const add = interleave((a: number, b: number) => a + b);
		assert.strictEqual(await add(2, 3), 5);
	});

	it("should await the yield point before every call", async () => {
		const events: string[] = [];
		const yieldPoint = async (): Promise<void> => {
			events.push("yield");
		};
		const greet = interleave(async (name: string) => {
			events.push("call " + name);
			return "hello " + name;
		}, yieldPoint);

		assert.strictEqual(await greet("a"), "hello a");
		assert.strictEqual(await greet("b"), "hello b");
		assert.deepStrictEqual(events, ["yield", "call a", "yield", "call b"]);
	});

	it("should not call through when the yield point rejects", async () => {
		let called = false;
		const wrapped = interleave(() => {
			called = true;
		}, () => Promise.reject(new Error("no turn")));

		await assert.rejects(wrapped(), /no turn/);
		assert.strictEqual(called, false);
	});

	it("should propagate errors from the wrapped function", async () => {
		const failing = interleave(async () => {
			throw new Error("conflict");
		});
		await assert.rejects(failing(), /conflict/);
	});
});

describe("yieldIfScheduled", () => {
	it("should do nothing without a yield point", async () => {
		assert.strictEqual(await yieldIfScheduled(), undefined);
	});

	it("should run the yield point once", async () => {
		let calls = 0;
		await yieldIfScheduled(async () => {
			calls++;
		});
		assert.strictEqual(calls, 1);
	});
});
