/**
 * Environment Configuration
 *
 * Loads and validates environment variables for the template sync service.
 */

import { CommonEnvSchemas, parseEnv, z } from '@template-sync/config';

export const envSchema = z.object({
	// Server
	PORT: CommonEnvSchemas.port.prefault('8000'),
	HOST: z.string().default('0.0.0.0'),
	NODE_ENV: CommonEnvSchemas.nodeEnv,

	// Logging
	LOG_LEVEL: CommonEnvSchemas.logLevel,
	LOG_PRETTY: CommonEnvSchemas.boolean,

	// Databases
	ACCOUNT_DATABASE_URL: z.string().default('postgres://localhost:5432/accounts'),
	WORKSPACE_DATABASE_URL: z.string().default('postgres://localhost:5432/workspace'),
	DATABASE_MAX_CONNECTIONS: CommonEnvSchemas.positiveInt.prefault('10'),
	DATABASE_CONNECT_TIMEOUT_S: CommonEnvSchemas.positiveInt.prefault('10'),
	DATABASE_STATEMENT_TIMEOUT_MS: CommonEnvSchemas.durationMs.prefault('15000'),

	// Caller authentication (shared secret)
	SYNC_SERVICE_TOKEN: z.string().optional(),

	// Template sync
	TEMPLATE_ADMIN_USERNAME: z.string().min(1).default('template-admin@example.com'),
	WORKSPACE_ROOT_FOLDER: z.string().min(1).default('En Garde'),
	UPGRADE_URL: z.string().default('https://example.com/pricing'),

	// HTTP
	CORS_ORIGINS: CommonEnvSchemas.stringArray,
	API_DOCS_ENABLED: CommonEnvSchemas.boolean,
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

export function getEnv(): Env {
	if (!cachedEnv) {
		cachedEnv = parseEnv(envSchema);
	}
	return cachedEnv;
}

export function isDevelopment(env: Pick<Env, 'NODE_ENV'> = getEnv()): boolean {
	return env.NODE_ENV === 'development';
}
