import { describe, it, expect, vi } from 'vitest';
import { createSilentLogger } from '@template-sync/logging';

import { verifyCallerToken } from '../auth/index.js';

const configured = { expectedToken: 'test-secret', developmentMode: false };

describe('verifyCallerToken', () => {
	it('should accept the configured bearer token', () => {
		expect(verifyCallerToken('Bearer test-secret', configured, createSilentLogger())).toBe(true);
		expect(verifyCallerToken('bearer test-secret', configured, createSilentLogger())).toBe(true);
	});

	it('should reject wrong, missing and malformed tokens', () => {
		const logger = createSilentLogger();
		expect(verifyCallerToken('Bearer wrong-secret', configured, logger)).toBe(false);
		expect(verifyCallerToken('Bearer test-secret-2', configured, logger)).toBe(false);
		expect(verifyCallerToken(undefined, configured, logger)).toBe(false);
		expect(verifyCallerToken('Bearer ', configured, logger)).toBe(false);
		expect(verifyCallerToken('Basic dGVzdA==', configured, logger)).toBe(false);
		expect(verifyCallerToken('test-secret', configured, logger)).toBe(false);
	});

	it('should warn about an invalid token', () => {
		const logger = createSilentLogger();
		const warn = vi.spyOn(logger, 'warn');

		verifyCallerToken('Bearer nope', configured, logger);

		expect(warn).toHaveBeenCalledWith('Invalid service token');
	});

	it('should reject everything when no token is configured outside development', () => {
		const options = { expectedToken: undefined, developmentMode: false };
		expect(verifyCallerToken('Bearer anything', options, createSilentLogger())).toBe(false);
		expect(verifyCallerToken(undefined, options, createSilentLogger())).toBe(false);
	});

	it('should accept everything when no token is configured in development', () => {
		const options = { expectedToken: undefined, developmentMode: true };
		expect(verifyCallerToken(undefined, options, createSilentLogger())).toBe(true);
	});
});
