import { describe, it, expect, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { Type } from '@sinclair/typebox';
import { errorHandlerPlugin, createStandardErrorHandlerOptions } from '../error-handler.js';

class StoreDownError extends Error {
	constructor() {
		super('account store is unavailable');
		this.name = 'StoreDownError';
	}
}

async function buildApp(): Promise<FastifyInstance> {
	const app = Fastify();
	await app.register(
		errorHandlerPlugin,
		createStandardErrorHandlerOptions([
			{
				canHandle: (e) => e instanceof StoreDownError,
				toResponse: (e) => ({ status: 503, body: { code: 'UPSTREAM_UNAVAILABLE', message: e.message } }),
			},
		]),
	);

	app.get('/boom', async () => {
		throw new Error('boom');
	});
	app.get('/down', async () => {
		throw new StoreDownError();
	});
	app.get('/gone', async () => {
		throw Object.assign(new Error('gone'), { statusCode: 410 });
	});
	app.get(
		'/typed',
		{ schema: { querystring: Type.Object({ n: Type.Integer() }) } },
		async () => ({ ok: true }),
	);
	app.post('/json', async () => ({ ok: true }));

	return app;
}

describe('errorHandlerPlugin', () => {
	let app: FastifyInstance;

	afterEach(async () => {
		await app.close();
	});

	it('should hide unexpected errors behind a generic 500', async () => {
		app = await buildApp();
		const res = await app.inject({ method: 'GET', url: '/boom' });

		expect(res.statusCode).toBe(500);
		expect(res.json()).toEqual({ code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' });
	});

	it('should apply service-specific mappers', async () => {
		app = await buildApp();
		const res = await app.inject({ method: 'GET', url: '/down' });

		expect(res.statusCode).toBe(503);
		expect(res.json()).toEqual({ code: 'UPSTREAM_UNAVAILABLE', message: 'account store is unavailable' });
	});

	it('should pass through client error status codes', async () => {
		app = await buildApp();
		const res = await app.inject({ method: 'GET', url: '/gone' });

		expect(res.statusCode).toBe(410);
		expect(res.json()).toEqual({ code: 'HTTP_410', message: 'gone' });
	});

	it('should report schema validation failures', async () => {
		app = await buildApp();
		const res = await app.inject({ method: 'GET', url: '/typed?n=abc' });

		expect(res.statusCode).toBe(400);
		expect(res.json().code).toBe('VALIDATION_ERROR');
	});

	it('should report malformed JSON bodies', async () => {
		app = await buildApp();
		const res = await app.inject({
			method: 'POST',
			url: '/json',
			headers: { 'content-type': 'application/json' },
			payload: '{"broken"',
		});

		expect(res.statusCode).toBe(400);
		expect(res.json()).toEqual({ code: 'INVALID_JSON', message: 'Invalid JSON in request body' });
	});
});
