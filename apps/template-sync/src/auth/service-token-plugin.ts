/**
 * Service Token Plugin
 *
 * Rejects every request outside the public paths unless it carries the
 * shared service token.
 */

import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import type { Logger } from '@template-sync/logging';
import { unauthorized } from '@template-sync/http';

import { verifyCallerToken, type ServiceTokenOptions } from './service-token.js';

export interface ServiceTokenPluginOptions extends ServiceTokenOptions {
	readonly logger: Logger;
	/** Paths served without a token (default: / and /health) */
	readonly publicPaths?: readonly string[];
}

const DEFAULT_PUBLIC_PATHS = ['/', '/health'];

function isPublicPath(url: string, publicPaths: readonly string[]): boolean {
	const path = url.split('?')[0] ?? url;
	return publicPaths.some((publicPath) => {
		if (publicPath.endsWith('*')) {
			return path.startsWith(publicPath.slice(0, -1));
		}
		return path === publicPath;
	});
}

const serviceTokenPluginAsync: FastifyPluginAsync<ServiceTokenPluginOptions> = async (fastify, opts) => {
	const publicPaths = opts.publicPaths ?? DEFAULT_PUBLIC_PATHS;
	const logger = opts.logger.child({ component: 'Auth' });
	const tokenOptions: ServiceTokenOptions = {
		expectedToken: opts.expectedToken,
		developmentMode: opts.developmentMode,
	};

	if (!opts.expectedToken) {
		if (opts.developmentMode) {
			logger.warn('SYNC_SERVICE_TOKEN is not set; authentication is disabled in development mode');
		} else {
			logger.error('SYNC_SERVICE_TOKEN is not set; all protected requests will be rejected');
		}
	}

	fastify.addHook('onRequest', async (request, reply) => {
		if (isPublicPath(request.url, publicPaths)) {
			return;
		}

		if (!verifyCallerToken(request.headers.authorization, tokenOptions, logger)) {
			reply.header('WWW-Authenticate', 'Bearer');
			return unauthorized(reply, 'Invalid or missing service token');
		}
	});
};

export const serviceTokenPlugin = fp(serviceTokenPluginAsync, {
	name: 'template-sync-service-token',
	fastify: '5.x',
});
