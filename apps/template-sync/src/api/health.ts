/**
 * Health API
 */

import type { FastifyInstance } from 'fastify';
import { Type, type Static } from '@sinclair/typebox';
import { jsonSuccess } from '@template-sync/http';

const HealthResponseSchema = Type.Object({
	service: Type.String(),
	status: Type.String(),
	version: Type.String(),
});

type HealthResponse = Static<typeof HealthResponseSchema>;

export interface HealthRoutesDeps {
	readonly serviceName: string;
	readonly version: string;
}

export async function registerHealthRoutes(fastify: FastifyInstance, deps: HealthRoutesDeps): Promise<void> {
	const body: HealthResponse = { service: deps.serviceName, status: 'healthy', version: deps.version };
	const schema = { tags: ['Health'], response: { 200: HealthResponseSchema } };

	fastify.get('/', { schema }, async (_request, reply) => jsonSuccess(reply, body));
	fastify.get('/health', { schema }, async (_request, reply) => jsonSuccess(reply, body));
}
