/**
 * Response Utilities
 *
 * Utilities for mapping Result types to HTTP responses and
 * handling errors consistently with Fastify.
 */

import type { FastifyReply } from 'fastify';
import { Result, UseCaseError } from '@template-sync/domain-core';
import type { ErrorResponse } from './types.js';

/**
 * Get HTTP status code for a use case error.
 */
export function getErrorStatus(error: UseCaseError): number {
	return UseCaseError.httpStatus(error);
}

/**
 * Convert a use case error to an error response.
 */
export function toErrorResponse(error: UseCaseError): ErrorResponse {
	const hasDetails = Object.keys(error.details).length > 0;
	return {
		message: error.message,
		code: error.code,
		...(hasDetails ? { details: error.details } : {}),
	};
}

/**
 * Options for sending a result as HTTP response.
 */
export interface SendResultOptions<T, R> {
	/** Status code for success (default: 200) */
	successStatus?: number;
	/** Transform success value before sending */
	transform?: (value: T) => R;
}

/**
 * Send a Result as an HTTP response.
 *
 * On success, sends the value (optionally transformed) with the success status.
 * On failure, maps the error to an appropriate HTTP status and error response.
 *
 * @example
 * ```typescript
 * fastify.get('/sync/:userId/status', async (request, reply) => {
 *     const result = await getSyncStatus.execute({ userId: request.params.userId });
 *     return sendResult(reply, result, { transform: toSyncStatusResponse });
 * });
 * ```
 */
export function sendResult<T, R = T>(
	reply: FastifyReply,
	result: Result<T>,
	options: SendResultOptions<T, R> = {},
): FastifyReply {
	const { successStatus = 200, transform } = options;

	if (Result.isSuccess(result)) {
		const value = transform ? transform(result.value) : result.value;
		return reply.status(successStatus).send(value);
	}

	const status = getErrorStatus(result.error);
	const response = toErrorResponse(result.error);
	return reply.status(status).send(response);
}

/**
 * Create a success JSON response.
 */
export function jsonSuccess<T>(reply: FastifyReply, data: T, status: number = 200): FastifyReply {
	return reply.status(status).send(data);
}

/**
 * Create an unauthorized (401) error response.
 */
export function unauthorized(reply: FastifyReply, message: string = 'Authentication required'): FastifyReply {
	const response: ErrorResponse = { code: 'UNAUTHORIZED', message };
	return reply.status(401).send(response);
}
