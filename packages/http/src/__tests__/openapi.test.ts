import { describe, it, expect } from 'vitest';
import { Value } from '@sinclair/typebox/value';
import { ErrorResponseSchema, errorResponses } from '../openapi.js';
import { shouldSkipLogging } from '../logging.js';

describe('OpenAPI Utilities', () => {
	it('should accept valid error responses', () => {
		expect(Value.Check(ErrorResponseSchema, { code: 'NOT_FOUND', message: 'Missing' })).toBe(true);
		expect(Value.Check(ErrorResponseSchema, { code: 'NOT_FOUND', message: 'Missing', details: { id: 'x' } })).toBe(true);
	});

	it('should reject error responses without a code', () => {
		expect(Value.Check(ErrorResponseSchema, { message: 'Missing' })).toBe(false);
	});

	it('should build error response entries for each status', () => {
		const responses = errorResponses(401, 503);
		expect(Object.keys(responses)).toEqual(['401', '503']);
		expect(responses[401]).toBe(ErrorResponseSchema);
	});
});

describe('shouldSkipLogging', () => {
	it('should match paths ignoring the query string', () => {
		expect(shouldSkipLogging('/health?probe=1', ['/health'])).toBe(true);
		expect(shouldSkipLogging('/sync/abc/status', ['/health'])).toBe(false);
		expect(shouldSkipLogging('/health')).toBe(false);
	});
});
