/**
 * Service Token Verification
 *
 * Callers authenticate with a shared secret sent as `Authorization: Bearer <token>`.
 */

import { timingSafeEqual } from 'node:crypto';
import type { Logger } from '@template-sync/logging';

export interface ServiceTokenOptions {
	/** Expected token; unset means no secret is configured */
	readonly expectedToken: string | undefined;
	/** Accept any caller when no secret is configured */
	readonly developmentMode: boolean;
}

const BEARER_PREFIX = 'bearer ';

function extractBearerToken(headerValue: string | undefined): string | undefined {
	if (!headerValue) return undefined;
	if (headerValue.slice(0, BEARER_PREFIX.length).toLowerCase() !== BEARER_PREFIX) return undefined;
	const token = headerValue.slice(BEARER_PREFIX.length).trim();
	return token === '' ? undefined : token;
}

function constantTimeEquals(a: string, b: string): boolean {
	const left = Buffer.from(a, 'utf8');
	const right = Buffer.from(b, 'utf8');
	if (left.length !== right.length) {
		// Compare anyway so the time taken does not depend on where the inputs differ.
		timingSafeEqual(left, left);
		return false;
	}
	return timingSafeEqual(left, right);
}

/**
 * Check an Authorization header value against the configured token.
 *
 * With no token configured every call is rejected and an error is logged,
 * except in development mode, where every call is accepted with a warning.
 */
export function verifyCallerToken(headerValue: string | undefined, options: ServiceTokenOptions, logger: Logger): boolean {
	if (!options.expectedToken) {
		if (options.developmentMode) {
			logger.warn('SYNC_SERVICE_TOKEN is not set, accepting unauthenticated call in development mode');
			return true;
		}
		logger.error('SYNC_SERVICE_TOKEN is not set, rejecting call');
		return false;
	}

	const token = extractBearerToken(headerValue);
	if (token === undefined) {
		logger.debug('Missing or malformed Authorization header');
		return false;
	}

	if (!constantTimeEquals(token, options.expectedToken)) {
		logger.warn('Invalid service token');
		return false;
	}

	return true;
}
