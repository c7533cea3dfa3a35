import { err, ok, Result } from './Result';

/**
 * Result returned by a guard
 */
export interface IGuardError {
	argName: string;
	message: string;
}

/**
 * Individual argument passed to a guard
 */
export interface IGuardArgument {
	arg: unknown;
	argName: string;
}

export type GuardArgumentCollection = IGuardArgument[];

// 8-4-4-4-12 hex digits, with or without braces, or 32 bare hex digits
const guidRegExp = /^(\{?[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\}?|[0-9a-f]{32})$/i;

/**
 * Standard argument checks. Each guard returns `ok(null)` when the check passes and an `IGuardError`
 * naming the failing argument when it doesn't.
 */
export class Guard {
	/**
	 * Guards to ensure the passed value is NOT null or undefined ("against" means not null or undefined -> ok)
	 */
	public static againstNullOrUndefined(arg: unknown, argName: string): Result<null, IGuardError> {
		if (arg === null || arg === undefined) {
			return err({ argName, message: `${argName} is null or undefined` });
		}
		return ok(null);
	}

	/**
	 * Runs `againstNullOrUndefined` on each member of `args` and returns the first failure
	 */
	public static againstNullOrUndefinedBulk(args: GuardArgumentCollection): Result<null, IGuardError> {
		for (const arg of args) {
			const result = this.againstNullOrUndefined(arg.arg, arg.argName);
			if (result.isErr()) return result;
		}

		return ok(null);
	}

	/**
	 * Guards to ensure the argument is in a list of valid values ("is" means is in list -> ok)
	 *
	 * @remarks
	 * Uses `Array.includes()`, so use it for simple values (string, number, etc.), not objects.
	 */
	public static isOneOf(arg: unknown, validValues: unknown[], argName: string): Result<null, IGuardError> {
		if (validValues.includes(arg)) {
			return ok(null);
		}
		return err({ argName, message: `is not one of ${JSON.stringify(validValues)} ; ${argName} |${arg}|` });
	}

	public static isValidGuid(arg: unknown, argName: string): Result<null, IGuardError> {
		if (typeof arg === 'string' && guidRegExp.test(arg.trim())) {
			return ok(null);
		}
		return err({ argName, message: `not a valid GUID ; ${argName} |${arg}|` });
	}

	/**
	 * Guards to ensure the argument is an integer greater than zero, or a string that parses to one
	 */
	public static isPositiveInteger(arg: unknown, argName: string): Result<null, IGuardError> {
		const value = typeof arg === 'string' && /^\s*\d+\s*$/.test(arg) ? parseInt(arg, 10) : arg;
		if (typeof value === 'number' && Number.isInteger(value) && value > 0) {
			return ok(null);
		}
		return err({ argName, message: `not a positive integer ; ${argName} |${arg}|` });
	}
}
