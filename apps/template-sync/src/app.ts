/**
 * HTTP Application
 *
 * Assembles the Fastify instance: documentation, CORS, caller
 * authentication, error mapping and routes. Kept free of process concerns so
 * tests can build it around in-memory dependencies.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import cors from '@fastify/cors';
import type { LoggerOptions } from 'pino';
import {
	errorHandlerPlugin,
	createStandardErrorHandlerOptions,
	shouldSkipLogging,
	type ErrorMapper,
} from '@template-sync/http';
import type { Logger } from '@template-sync/logging';
import { UpstreamUnavailableError } from '@template-sync/persistence';

import { registerApiRoutes, type SyncRoutesDeps } from './api/index.js';
import { serviceTokenPlugin } from './auth/index.js';

export const SERVICE_NAME = 'template-sync';
export const SERVICE_VERSION = '1.0.0';

export interface AppConfig {
	/** Fastify logger options, or false to disable request logging entirely */
	readonly loggerOptions: LoggerOptions | false;
	/** Logger for components outside the request lifecycle */
	readonly logger: Logger;
	readonly serviceToken: string | undefined;
	readonly developmentMode: boolean;
	readonly corsOrigins: readonly string[];
	readonly docsEnabled: boolean;
}

export type AppDeps = SyncRoutesDeps;

const ACCESS_LOG_SKIP_PATHS = ['/', '/health'];

/**
 * Maps store outages to 503 so callers can retry.
 */
export const upstreamUnavailableMapper: ErrorMapper = {
	canHandle: (error) => error instanceof UpstreamUnavailableError,
	toResponse: (error) => ({
		status: 503,
		body: { code: 'UPSTREAM_UNAVAILABLE', message: error.message },
	}),
};

export async function createApp(config: AppConfig, deps: AppDeps): Promise<FastifyInstance> {
	const fastify = Fastify({
		logger: config.loggerOptions,
		disableRequestLogging: true,
	});

	if (config.docsEnabled) {
		await fastify.register(swagger, {
			openapi: {
				openapi: '3.1.0',
				info: {
					title: 'Template Sync API',
					version: SERVICE_VERSION,
					description: 'Syncs workflow templates into user workspaces according to subscription tier.',
				},
				servers: [{ url: '/' }],
				components: {
					securitySchemes: {
						bearerAuth: {
							type: 'http',
							scheme: 'bearer',
						},
					},
				},
				security: [{ bearerAuth: [] }],
			},
		});

		await fastify.register(swaggerUi, {
			routePrefix: '/docs',
			uiConfig: {
				docExpansion: 'list',
				deepLinking: true,
			},
		});
	}

	// CORS (disabled unless origins are configured)
	await fastify.register(cors, {
		origin: config.corsOrigins.length > 0 ? [...config.corsOrigins] : false,
		credentials: true,
	});

	await fastify.register(serviceTokenPlugin, {
		expectedToken: config.serviceToken,
		developmentMode: config.developmentMode,
		logger: config.logger,
		publicPaths: config.docsEnabled ? ['/', '/health', '/docs', '/docs/*'] : ['/', '/health'],
	});

	await fastify.register(errorHandlerPlugin, createStandardErrorHandlerOptions([upstreamUnavailableMapper]));

	fastify.addHook('onResponse', async (request, reply) => {
		if (shouldSkipLogging(request.url, ACCESS_LOG_SKIP_PATHS)) return;
		request.log.info(
			{ method: request.method, url: request.url, statusCode: reply.statusCode, responseTime: reply.elapsedTime },
			'Request completed',
		);
	});

	await registerApiRoutes(fastify, {
		...deps,
		serviceName: SERVICE_NAME,
		version: SERVICE_VERSION,
	});

	return fastify;
}
