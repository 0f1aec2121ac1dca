import { describe, it, expect } from 'vitest';
import { parseEnv } from '@template-sync/config';

import { envSchema, isDevelopment } from '../env.js';

describe('envSchema', () => {
	it('should read the caller token and development mode', () => {
		const env = parseEnv(envSchema, { SYNC_SERVICE_TOKEN: 'test-secret', NODE_ENV: 'development' });

		expect(env.SYNC_SERVICE_TOKEN).toBe('test-secret');
		expect(isDevelopment(env)).toBe(true);
	});

	it('should ignore the previous variable names', () => {
		const env = parseEnv(envSchema, { SUBS_SYNC_SERVICE_TOKEN: 'test-secret', ENV: 'development' });

		expect(env.SYNC_SERVICE_TOKEN).toBeUndefined();
		expect(isDevelopment(env)).toBe(false);
	});
});
