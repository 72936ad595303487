// Interleave Error Types
// Error domain for schedule validation, yield misuse and task failures

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Setup errors
	InvalidSchedule: "InvalidSchedule",
	AlreadyStarted: "AlreadyStarted",

	// Yield protocol misuse
	OutsideWorker: "OutsideWorker",
	WorkerFinished: "WorkerFinished",
	YieldNotAwaited: "YieldNotAwaited",

	// Run outcome
	TaskFailed: "TaskFailed",

	// Injected logger threw
	LoggerFailed: "LoggerFailed",

	// Internal invariants
	NoActiveWorker: "NoActiveWorker",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

//==============================================================================
// Task Failure Record
//==============================================================================

export interface TaskFailure {
	ordinal: number;
	name: string;
	error: unknown;
}

//==============================================================================
// Scheduler Error Class
//==============================================================================

export class SchedulerError extends Error {
	readonly code: ErrorCode;
	readonly failures?: readonly TaskFailure[];

	constructor(
		code: ErrorCode,
		message: string,
		options: { cause?: unknown; failures?: readonly TaskFailure[] } = {},
	) {
		super(message, "cause" in options ? { cause: options.cause } : undefined);
		this.name = "SchedulerError";
		this.code = code;
		if (options.failures !== undefined) this.failures = options.failures;
	}

	/**
	 * Create an InvalidSchedule error from validation errors
	 */
	static invalidSchedule(errors: readonly ValidationError[]): SchedulerError {
		return new SchedulerError(
			ErrorCodes.InvalidSchedule,
			"Invalid schedule: " + errors.map(formatValidationError).join("; "),
		);
	}

	static alreadyStarted(): SchedulerError {
		return new SchedulerError(
			ErrorCodes.AlreadyStarted,
			"Scheduler has already been started; create a new one for each run",
		);
	}

	static outsideWorker(): SchedulerError {
		return new SchedulerError(
			ErrorCodes.OutsideWorker,
			"next() called outside of a task body run by this scheduler",
		);
	}

	static workerFinished(name: string): SchedulerError {
		return new SchedulerError(
			ErrorCodes.WorkerFinished,
			"next() called by " + name + " after its task body returned",
		);
	}

	static yieldNotAwaited(name: string): SchedulerError {
		return new SchedulerError(
			ErrorCodes.YieldNotAwaited,
			"next() called by " + name + " before its previous next() resolved",
		);
	}

	/**
	 * Create a TaskFailed error; the first failure becomes the cause
	 */
	static taskFailed(failures: readonly TaskFailure[], total: number): SchedulerError {
		const names = failures.map((f) => f.name).join(", ");
		return new SchedulerError(
			ErrorCodes.TaskFailed,
			String(failures.length) +
				" of " +
				String(total) +
				" tasks failed: " +
				names,
			{ cause: failures[0]?.error, failures },
		);
	}

	static loggerFailed(error: unknown): SchedulerError {
		return new SchedulerError(
			ErrorCodes.LoggerFailed,
			"Logger threw during the run: " + String(error),
			{ cause: error },
		);
	}

	static noActiveWorker(): SchedulerError {
		return new SchedulerError(
			ErrorCodes.NoActiveWorker,
			"No active worker left to hand the floor to",
		);
	}
}

//==============================================================================
// Validation Error Type
//==============================================================================

export interface ValidationError {
	path: string;
	message: string;
	value?: unknown;
}

export interface ValidationResult<T> {
	valid: boolean;
	errors: ValidationError[];
	value?: T;
}

/**
 * Create a successful validation result.
 */
export function validResult<T>(value: T): ValidationResult<T> {
	return { valid: true, errors: [], value };
}

/**
 * Create a failed validation result.
 */
export function invalidResult<T>(
	errors: ValidationError[],
): ValidationResult<T> {
	return { valid: false, errors };
}

function formatValidationError(error: ValidationError): string {
	return error.path + ": " + error.message;
}

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/**
 * Asserts that a value is `never`, ensuring exhaustive type checking.
 * Use in switch default cases to ensure all variants are handled.
 *
 * @example
 * switch (event.kind) {
 *   case "launch": return ...;
 *   case "skip": return ...;
 *   default:
 *     exhaustive(event); // Type error if a kind is missing
 * }
 */
export function exhaustive(value: never): never {
	throw new Error(`Unexpected value: ${String(value)}`);
}
