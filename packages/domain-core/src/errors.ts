/**
 * Use Case Error Types
 *
 * Sealed error hierarchy for expected use case failures. Errors are categorized
 * by type to enable consistent HTTP status mapping and client-side handling.
 *
 * HTTP Status Mapping:
 * - NotFoundError → 404 Not Found
 */

/**
 * Base interface for all use case errors.
 */
export interface UseCaseErrorBase {
	readonly type: string;
	readonly code: string;
	readonly message: string;
	readonly details: Record<string, unknown>;
}

/**
 * Entity not found in one of the backing stores.
 */
export interface NotFoundError extends UseCaseErrorBase {
	readonly type: 'not_found';
}

/**
 * Errors a use case can return.
 */
export type UseCaseError = NotFoundError;

/**
 * Factory functions for creating errors.
 */
export const UseCaseError = {
	/**
	 * @example
	 * ```typescript
	 * UseCaseError.notFound('ENTITLEMENT_NOT_FOUND', 'User not found in account store', { userId })
	 * ```
	 */
	notFound(code: string, message: string, details: Record<string, unknown> = {}): NotFoundError {
		return { type: 'not_found', code, message, details };
	},

	/**
	 * Get the HTTP status code for an error.
	 */
	httpStatus(error: UseCaseError): number {
		switch (error.type) {
			case 'not_found':
				return 404;
		}
	},
};
