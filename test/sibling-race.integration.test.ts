// Interleave Integration Tests
// Reproduces a lost update when sibling links are added concurrently

import { describe, it } from "node:test";
import assert from "node:assert";
import { ErrorCodes, SchedulerError } from "../src/errors.js";
import { silentLogger } from "../src/logger.js";
import { InterleavingScheduler } from "../src/scheduler.js";
import {
	ConflictError,
	InMemoryPersonStore,
	VersionedPersonStore,
	addSibling,
	baggins,
	instrument,
} from "./fixtures/person-store.js";

describe("adding siblings concurrently", () => {
	it("should keep every sibling when requests run one after another", async () => {
		const store = new InMemoryPersonStore(baggins());
		const repository = instrument(store);

		for (const sibling of ["bilbo", "merry", "pippin"]) {
			await addSibling(repository, "frodo", sibling);
		}

		const frodo = await store.findById("frodo");
		assert.deepStrictEqual(frodo.siblings, ["bilbo", "merry", "pippin"]);
		assert.strictEqual(frodo.version, 3);
	});

	it("should lose an update when the second and third requests interleave", async () => {
		const store = new InMemoryPersonStore(baggins());
		const scheduler = new InterleavingScheduler({ logger: silentLogger });
		const repository = instrument(store, scheduler.yieldPoint);

		// The first request runs through both repository calls without yielding
		await scheduler.start(
			["bilbo", "merry", "pippin"].map((sibling) => () =>
				addSibling(repository, "frodo", sibling),
			),
			[[0, 1]],
		);

		const frodo = await store.findById("frodo");
		assert.deepStrictEqual(frodo.siblings, ["bilbo", "pippin"]);
	});

	it("should lose two updates when every request reads before anyone writes", async () => {
		const store = new InMemoryPersonStore(baggins());
		const scheduler = new InterleavingScheduler({ logger: silentLogger });
		const repository = instrument(store, scheduler.yieldPoint);

		await scheduler.start(
			["bilbo", "merry", "pippin"].map((sibling) => () =>
				addSibling(repository, "frodo", sibling),
			),
		);

		const frodo = await store.findById("frodo");
		assert.deepStrictEqual(frodo.siblings, ["pippin"]);
	});

	it("should turn the lost update into a conflict with a version check", async () => {
		const store = new VersionedPersonStore(baggins());
		const scheduler = new InterleavingScheduler({ logger: silentLogger });
		const repository = instrument(store, scheduler.yieldPoint);

		await assert.rejects(
			scheduler.start(
				["bilbo", "merry", "pippin"].map((sibling) => ({
					name: "add-" + sibling,
					run: () => addSibling(repository, "frodo", sibling),
				})),
				[[0, 1]],
			),
			(error: unknown) => {
				assert.ok(error instanceof SchedulerError);
				assert.strictEqual(error.code, ErrorCodes.TaskFailed);
				assert.strictEqual(error.failures?.length, 1);
				assert.strictEqual(error.failures?.[0]?.name, "add-pippin");
				assert.ok(error.cause instanceof ConflictError);
				assert.strictEqual(
					error.cause.message,
					"Person frodo is at version 2, expected 1",
				);
				return true;
			},
		);

		const frodo = await store.findById("frodo");
		assert.deepStrictEqual(frodo.siblings, ["bilbo", "merry"]);
		assert.strictEqual(frodo.version, 2);
	});
});
