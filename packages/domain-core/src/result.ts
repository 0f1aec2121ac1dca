/**
 * Result Type for Use Case Execution
 *
 * A discriminated union with two variants:
 * - Success<T> - contains the successful result value
 * - Failure<T> - contains the error details
 *
 * Expected outcomes (unknown user, invalid input) travel as failures.
 * Faults (a database that cannot be reached) are thrown and handled by the
 * HTTP error handler.
 *
 * Usage in API layer:
 * ```typescript
 * const result = await useCase.execute(command);
 * return sendResult(reply, result, { transform: toResponse });
 * ```
 */

import type { UseCaseError } from './errors.js';

/**
 * Successful result containing the value.
 */
export interface Success<T> {
	readonly _tag: 'success';
	readonly value: T;
}

/**
 * Failed result containing the error.
 */
export interface Failure {
	readonly _tag: 'failure';
	readonly error: UseCaseError;
}

/**
 * Result type - either Success or Failure.
 */
export type Result<T> = Success<T> | Failure;

/**
 * Type guard to check if a result is a success.
 */
export function isSuccess<T>(result: Result<T>): result is Success<T> {
	return result._tag === 'success';
}

/**
 * Type guard to check if a result is a failure.
 */
export function isFailure<T>(result: Result<T>): result is Failure {
	return result._tag === 'failure';
}

/**
 * Result factory functions.
 */
export const Result = {
	success<T>(value: T): Success<T> {
		return { _tag: 'success', value };
	},

	failure(error: UseCaseError): Failure {
		return { _tag: 'failure', error };
	},

	isSuccess,

	isFailure,
};
