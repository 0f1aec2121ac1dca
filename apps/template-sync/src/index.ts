/**
 * Template Sync Service
 *
 * Reads subscription entitlements from the account store and copies the
 * templates a user may receive into their workspace.
 */

import { fileURLToPath } from 'node:url';
import { resolve } from 'node:path';
import type { FastifyInstance } from 'fastify';
import { createFastifyLoggerOptions } from '@template-sync/http';
import { createLogger, type LogLevel } from '@template-sync/logging';
import { createDatabase } from '@template-sync/persistence';

import {
	createCheckTemplateAccessUseCase,
	createGetSyncStatusUseCase,
	createSyncUserTemplatesUseCase,
	createUserDirectory,
} from './application/index.js';
import { createApp, SERVICE_NAME } from './app.js';
import { getEnv, isDevelopment } from './env.js';
import {
	createAccountRepository,
	createTemplateCatalogRepository,
	createWorkspaceRepository,
	createWorkspaceUserRepository,
} from './infrastructure/persistence/index.js';

export interface ServerConfig {
	port?: number;
	host?: string;
	accountDatabaseUrl?: string;
	workspaceDatabaseUrl?: string;
	logLevel?: LogLevel;
}

/**
 * Start the template sync service.
 *
 * @returns The Fastify instance (ready and listening) and a function that
 * stops it and closes both database pools
 */
export async function startServer(
	config?: ServerConfig,
): Promise<{ server: FastifyInstance; stop: () => Promise<void> }> {
	const env = getEnv();
	const development = isDevelopment(env);

	const port = config?.port ?? env.PORT;
	const host = config?.host ?? env.HOST;
	const loggerConfig = {
		level: config?.logLevel ?? env.LOG_LEVEL,
		serviceName: SERVICE_NAME,
		pretty: env.LOG_PRETTY,
	};
	const logger = createLogger(loggerConfig);

	logger.info({ env: env.NODE_ENV }, 'Starting template sync service');

	const poolOptions = {
		maxConnections: env.DATABASE_MAX_CONNECTIONS,
		connectTimeout: env.DATABASE_CONNECT_TIMEOUT_S,
		statementTimeoutMs: env.DATABASE_STATEMENT_TIMEOUT_MS,
	};
	const accountDatabase = createDatabase({
		url: config?.accountDatabaseUrl ?? env.ACCOUNT_DATABASE_URL,
		name: 'account',
		...poolOptions,
	});
	const workspaceDatabase = createDatabase({
		url: config?.workspaceDatabaseUrl ?? env.WORKSPACE_DATABASE_URL,
		name: 'workspace',
		...poolOptions,
	});

	// Repositories
	const accountRepository = createAccountRepository(accountDatabase.db);
	const workspaceUserRepository = createWorkspaceUserRepository(workspaceDatabase.db);
	const templateCatalog = createTemplateCatalogRepository(workspaceDatabase.db, env.TEMPLATE_ADMIN_USERNAME);
	const workspaceRepository = createWorkspaceRepository(workspaceDatabase.db);

	// Use cases
	const userDirectory = createUserDirectory({ accountRepository, workspaceUserRepository, logger });
	const syncUserTemplatesUseCase = createSyncUserTemplatesUseCase({
		userDirectory,
		templateCatalog,
		workspaceRepository,
		rootFolderName: env.WORKSPACE_ROOT_FOLDER,
		logger,
	});
	const getSyncStatusUseCase = createGetSyncStatusUseCase({
		userDirectory,
		templateCatalog,
		workspaceRepository,
		logger,
	});
	const checkTemplateAccessUseCase = createCheckTemplateAccessUseCase({
		userDirectory,
		templateCatalog,
		upgradeUrl: env.UPGRADE_URL,
		logger,
	});

	const server = await createApp(
		{
			loggerOptions: createFastifyLoggerOptions(loggerConfig),
			logger,
			serviceToken: env.SYNC_SERVICE_TOKEN,
			developmentMode: development,
			corsOrigins: env.CORS_ORIGINS,
			docsEnabled: env.API_DOCS_ENABLED,
		},
		{ syncUserTemplatesUseCase, getSyncStatusUseCase, checkTemplateAccessUseCase },
	);

	await server.listen({ port, host });
	logger.info({ port, host }, 'Template sync service listening');

	if (development && env.API_DOCS_ENABLED) {
		logger.info(`OpenAPI docs: http://localhost:${port}/docs`);
	}

	async function stop(): Promise<void> {
		await server.close();
		await Promise.all([accountDatabase.close(), workspaceDatabase.close()]);
	}

	return { server, stop };
}

const self = resolve(fileURLToPath(import.meta.url));
const entry = process.argv[1] ? resolve(process.argv[1]) : '';

if (self === entry) {
	const env = getEnv();
	const logger = createLogger({ level: env.LOG_LEVEL, serviceName: SERVICE_NAME, pretty: env.LOG_PRETTY });

	try {
		const { stop } = await startServer();

		let shuttingDown = false;
		const shutdown = async (signal: string) => {
			if (shuttingDown) return;
			shuttingDown = true;

			logger.info({ signal }, 'Shutdown signal received');

			const forceShutdown = setTimeout(() => {
				logger.error('Forced shutdown after timeout');
				process.exit(1);
			}, 15_000);
			forceShutdown.unref();

			try {
				await stop();
				logger.info('Graceful shutdown complete');
				process.exit(0);
			} catch (error) {
				logger.error({ err: error }, 'Shutdown failed');
				process.exit(1);
			}
		};

		process.on('SIGINT', () => void shutdown('SIGINT'));
		process.on('SIGTERM', () => void shutdown('SIGTERM'));
	} catch (error) {
		logger.fatal({ err: error }, 'Failed to start template sync service');
		process.exit(1);
	}
}
