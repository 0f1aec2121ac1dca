/**
 * @template-sync/http
 *
 * HTTP layer utilities using Fastify:
 * - Result to HTTP response mapping
 * - Global error handler with pluggable error mappers
 * - TypeBox schema utilities for route definitions
 * - Pino logger options for Fastify
 *
 * @example
 * ```typescript
 * import Fastify from 'fastify';
 * import {
 *     errorHandlerPlugin,
 *     createStandardErrorHandlerOptions,
 *     createFastifyLoggerOptions,
 *     sendResult,
 * } from '@template-sync/http';
 *
 * const fastify = Fastify({
 *     logger: createFastifyLoggerOptions({ level: 'info', serviceName: 'template-sync' }),
 * });
 *
 * await fastify.register(errorHandlerPlugin, createStandardErrorHandlerOptions());
 *
 * fastify.get<{ Params: { userId: string } }>('/sync/:userId/status', async (request, reply) => {
 *     const result = await getSyncStatus.execute({ userId: request.params.userId });
 *     return sendResult(reply, result);
 * });
 * ```
 */

// Types
export { type ErrorResponse, type FastifyRequest, type FastifyReply, type Logger } from './types.js';

// Logging
export { createFastifyLoggerOptions, shouldSkipLogging, type LoggingConfig } from './logging.js';

// Response utilities
export {
	getErrorStatus,
	toErrorResponse,
	sendResult,
	jsonSuccess,
	unauthorized,
	type SendResultOptions,
} from './response.js';

// Error handler
export {
	errorHandlerPlugin,
	createCommonErrorMappers,
	createStandardErrorHandlerOptions,
	type ErrorHandlerConfig,
	type ErrorMapper,
} from './error-handler.js';

// OpenAPI schemas
export { ErrorResponseSchema, errorResponses } from './openapi.js';
