/**
 * Structured Logging
 *
 * Fastify uses Pino natively, so the request logger is configured with the
 * same options as the service's standalone logger.
 */

import type { LoggerOptions } from 'pino';
import { createLoggerOptions, type LoggerConfig } from '@template-sync/logging';

/**
 * Configuration for the Fastify logger.
 */
export interface LoggingConfig extends LoggerConfig {
	/** Request paths that are not logged (e.g., /health) */
	readonly skipPaths?: string[];
}

/**
 * Create Fastify logger options.
 *
 * @example
 * ```typescript
 * const fastify = Fastify({
 *     logger: createFastifyLoggerOptions({ level: 'info', serviceName: 'template-sync' }),
 *     disableRequestLogging: true,
 * });
 * ```
 */
export function createFastifyLoggerOptions(config: LoggingConfig): LoggerOptions {
	return createLoggerOptions(config);
}

/**
 * Whether a request path should be left out of the access log.
 */
export function shouldSkipLogging(path: string, skipPaths: readonly string[] = []): boolean {
	const pathname = path.split('?')[0] ?? path;
	return skipPaths.includes(pathname);
}
