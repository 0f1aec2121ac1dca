/**
 * HTTP Layer Types
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { Logger } from 'pino';

/**
 * Standard error response format.
 */
export interface ErrorResponse {
	/** Human-readable error message */
	readonly message: string;
	/** Machine-readable error code */
	readonly code: string;
	/** Additional error details */
	readonly details?: Record<string, unknown>;
}

export type { FastifyRequest, FastifyReply, Logger };
