/**
 * Error Handler
 *
 * Global error handler plugin for Fastify applications.
 * Catches exceptions and maps them to appropriate HTTP responses.
 */

import type { FastifyPluginAsync, FastifyError } from 'fastify';
import fp from 'fastify-plugin';
import type { ErrorResponse } from './types.js';

/**
 * Configuration for the error handler.
 */
export interface ErrorHandlerConfig {
	/** Whether to include stack traces in responses (default: false) */
	readonly includeStack?: boolean;
	/** Custom error mappers, tried in order before the status code fallback */
	readonly mappers?: ErrorMapper[];
}

/**
 * Custom error mapper.
 */
export interface ErrorMapper {
	/** Check if this mapper handles the error */
	canHandle: (error: FastifyError) => boolean;
	/** Map the error to an HTTP response */
	toResponse: (error: FastifyError) => { status: number; body: ErrorResponse };
}

/**
 * Create an error handler plugin for Fastify.
 *
 * Handles:
 * - Custom errors (via registered mappers)
 * - Fastify errors (statusCode property below 500)
 * - Unknown errors (returns 500 Internal Server Error)
 *
 * @example
 * ```typescript
 * await fastify.register(errorHandlerPlugin, {
 *     mappers: [
 *         ...createCommonErrorMappers(),
 *         {
 *             canHandle: (e) => e instanceof UpstreamUnavailableError,
 *             toResponse: (e) => ({
 *                 status: 503,
 *                 body: { code: 'UPSTREAM_UNAVAILABLE', message: e.message },
 *             }),
 *         },
 *     ],
 * });
 * ```
 */
const errorHandlerPluginAsync: FastifyPluginAsync<ErrorHandlerConfig> = async (fastify, opts) => {
	const { includeStack = false, mappers = [] } = opts;

	fastify.setErrorHandler((error: FastifyError, request, reply) => {
		const log = request.log;

		for (const mapper of mappers) {
			if (mapper.canHandle(error)) {
				const { status, body } = mapper.toResponse(error);

				if (status >= 500) {
					log.error({ err: error, status }, 'Mapped error');
				}

				return reply.status(status).send(body);
			}
		}

		const statusCode = error.statusCode ?? 500;

		if (statusCode < 500) {
			const body: ErrorResponse = {
				code: `HTTP_${statusCode}`,
				message: error.message || 'An error occurred',
			};
			return reply.status(statusCode).send(body);
		}

		log.error({ err: error }, 'Unhandled error');

		const body: ErrorResponse = {
			code: 'INTERNAL_ERROR',
			message: 'An unexpected error occurred',
			...(includeStack && error.stack ? { details: { stack: error.stack } } : {}),
		};

		return reply.status(500).send(body);
	});
};

export const errorHandlerPlugin = fp(errorHandlerPluginAsync, {
	name: 'template-sync-error-handler',
	fastify: '5.x',
});

/**
 * Create common error mappers.
 */
export function createCommonErrorMappers(): ErrorMapper[] {
	return [
		// Schema validation errors (from Fastify's AJV integration)
		{
			canHandle: (e) => e.code === 'FST_ERR_VALIDATION' || e.validation !== undefined,
			toResponse: (e) => ({
				status: 400,
				body: {
					code: 'VALIDATION_ERROR',
					message: e.message || 'Request validation failed',
					...(e.validation ? { details: { errors: e.validation } } : {}),
				},
			}),
		},
		// JSON parse errors
		{
			canHandle: (e) => e.code === 'FST_ERR_CTP_INVALID_JSON_BODY' || (e instanceof SyntaxError && e.message.includes('JSON')),
			toResponse: () => ({
				status: 400,
				body: {
					code: 'INVALID_JSON',
					message: 'Invalid JSON in request body',
				},
			}),
		},
	];
}

/**
 * Create the standard error handler options with common mappers, followed by
 * any service-specific ones.
 */
export function createStandardErrorHandlerOptions(extraMappers: ErrorMapper[] = []): ErrorHandlerConfig {
	return {
		mappers: [...createCommonErrorMappers(), ...extraMappers],
	};
}
