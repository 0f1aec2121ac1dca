/**
 * API Layer
 */

import type { FastifyInstance } from 'fastify';

import { registerHealthRoutes, type HealthRoutesDeps } from './health.js';
import { registerSyncRoutes, type SyncRoutesDeps } from './sync.js';

export type ApiRoutesDeps = HealthRoutesDeps & SyncRoutesDeps;

export async function registerApiRoutes(fastify: FastifyInstance, deps: ApiRoutesDeps): Promise<void> {
	await registerHealthRoutes(fastify, deps);
	await registerSyncRoutes(fastify, deps);
}

export { type HealthRoutesDeps, type SyncRoutesDeps };
export { toSyncResponse, toSyncStatusResponse, toAccessVerdictResponse } from './sync.js';
