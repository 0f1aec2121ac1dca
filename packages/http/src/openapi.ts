/**
 * OpenAPI Integration
 *
 * TypeBox schemas shared by route definitions. Fastify validates requests and
 * serializes responses from these JSON Schemas and @fastify/swagger documents
 * them.
 */

import { Type } from '@sinclair/typebox';

/**
 * Standard error response schema.
 */
export const ErrorResponseSchema = Type.Object({
	message: Type.String({ description: 'Human-readable error message' }),
	code: Type.String({ description: 'Machine-readable error code' }),
	details: Type.Optional(Type.Record(Type.String(), Type.Unknown(), { description: 'Additional error details' })),
});

/**
 * Route `response` entries for error statuses.
 *
 * @example
 * ```typescript
 * schema: {
 *     response: {
 *         200: SyncStatusResponseSchema,
 *         ...errorResponses(401, 404, 503),
 *     },
 * }
 * ```
 */
export function errorResponses(...statuses: number[]): Record<number, typeof ErrorResponseSchema> {
	const responses: Record<number, typeof ErrorResponseSchema> = {};
	for (const status of statuses) {
		responses[status] = ErrorResponseSchema;
	}
	return responses;
}
