// Interleave Schedule Validator
// Manual structural validation of start() arguments

import {
	invalidResult,
	type ValidationError,
	type ValidationResult,
	validResult,
} from "./errors.js";
import type { NamedTask, ScheduleDefinition, TaskBody } from "./types.js";

//==============================================================================
// Validation State
//==============================================================================

interface ValidationState {
	errors: ValidationError[];
	path: string[];
}

function currentPath(state: ValidationState): string {
	return state.path.length > 0 ? "$" + state.path.join("") : "$";
}

function addError(
	state: ValidationState,
	message: string,
	value?: unknown,
): void {
	const error: ValidationError = { path: currentPath(state), message };
	if (value !== undefined) error.value = value;
	state.errors.push(error);
}

function withPath(state: ValidationState, segment: string, fn: () => void): void {
	state.path.push(segment);
	try {
		fn();
	} finally {
		state.path.pop();
	}
}

//==============================================================================
// Primitive Validators
//==============================================================================

function isTaskBody(value: unknown): value is TaskBody {
	return typeof value === "function";
}

function isObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isIterable(value: unknown): value is Iterable<unknown> {
	return (
		typeof value === "object" &&
		value !== null &&
		Symbol.iterator in value &&
		typeof value[Symbol.iterator] === "function"
	);
}

function isStepIndex(value: unknown): value is number {
	return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

//==============================================================================
// Task Validation
//==============================================================================

function validateTask(
	state: ValidationState,
	value: unknown,
	ordinal: number,
): NamedTask | undefined {
	if (isTaskBody(value)) {
		return { name: defaultWorkerName(ordinal), run: value };
	}
	if (!isObject(value)) {
		addError(state, "Task must be a function or a { name, run } object");
		return undefined;
	}
	const { name, run } = value;
	if (typeof name !== "string" || name.length === 0) {
		withPath(state, ".name", () => {
			addError(state, "Task name must be a non-empty string", name);
		});
	}
	if (!isTaskBody(run)) {
		withPath(state, ".run", () => {
			addError(state, "Task run must be a function");
		});
	}
	if (typeof name !== "string" || name.length === 0 || !isTaskBody(run)) {
		return undefined;
	}
	return { name, run };
}

function validateSkipSet(
	state: ValidationState,
	value: unknown,
): ReadonlySet<number> | undefined {
	if (value === undefined) {
		return new Set<number>();
	}
	if (!isIterable(value)) {
		addError(state, "Skip set must be an iterable of step indices");
		return undefined;
	}
	const steps = new Set<number>();
	let index = 0;
	let valid = true;
	for (const step of value) {
		if (isStepIndex(step)) {
			steps.add(step);
		} else {
			withPath(state, `[${index}]`, () => {
				addError(state, "Step index must be a non-negative integer", step);
			});
			valid = false;
		}
		index++;
	}
	return valid ? steps : undefined;
}

//==============================================================================
// Schedule Validation
//==============================================================================

export function defaultWorkerName(ordinal: number): string {
	return `worker-${ordinal}`;
}

/**
 * Validate start() arguments and normalize them into a schedule definition.
 */
export function validateSchedule(
	tasks: unknown,
	skipSets: unknown = [],
): ValidationResult<ScheduleDefinition> {
	const state: ValidationState = { errors: [], path: [] };
	const named: NamedTask[] = [];
	const skips: ReadonlySet<number>[] = [];

	withPath(state, ".tasks", () => {
		if (!Array.isArray(tasks)) {
			addError(state, "Tasks must be an array");
			return;
		}
		if (tasks.length === 0) {
			addError(state, "At least one task is required");
			return;
		}
		for (let ordinal = 0; ordinal < tasks.length; ordinal++) {
			const task: unknown = tasks[ordinal];
			withPath(state, `[${ordinal}]`, () => {
				const result = validateTask(state, task, ordinal);
				if (result) named.push(result);
			});
		}
	});

	withPath(state, ".skipSets", () => {
		if (!Array.isArray(skipSets)) {
			addError(state, "Skip sets must be an array");
			return;
		}
		if (Array.isArray(tasks) && skipSets.length > tasks.length) {
			addError(
				state,
				`Got ${skipSets.length} skip sets for ${tasks.length} tasks`,
			);
			return;
		}
		for (let ordinal = 0; ordinal < skipSets.length; ordinal++) {
			const skipSet: unknown = skipSets[ordinal];
			withPath(state, `[${ordinal}]`, () => {
				const result = validateSkipSet(state, skipSet);
				if (result) skips.push(result);
			});
		}
	});

	if (state.errors.length > 0) {
		return invalidResult(state.errors);
	}

	while (skips.length < named.length) {
		skips.push(new Set<number>());
	}
	return validResult({ tasks: named, skipSets: skips });
}
