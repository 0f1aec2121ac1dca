/**
 * @template-sync/persistence
 *
 * Database persistence layer using DrizzleORM over postgres.js.
 *
 * Key components:
 * - Database connection and configuration
 * - Transaction management and advisory locks
 * - Upstream failure classification
 *
 * @example
 * ```typescript
 * import { createDatabase, createTransactionManager, createUpstreamGuard } from '@template-sync/persistence';
 *
 * const database = createDatabase({ url: env.WORKSPACE_DATABASE_URL, name: 'workspace' });
 * const transactionManager = createTransactionManager(database.db);
 * const guard = createUpstreamGuard('workspace');
 *
 * const folderId = await guard(() =>
 *     transactionManager.withAdvisoryLock(`folder:${ownerId}:${name}`, async (tx) => findOrInsert(tx)),
 * );
 * ```
 */

// Database connection
export { createDatabase, type Database, type DatabaseConfig, type Db } from './connection.js';

// Transaction management
export { createTransactionManager, resolveDb, type TransactionContext, type TransactionManager } from './transaction.js';

// Upstream failures
export {
	UpstreamUnavailableError,
	isUpstreamFailure,
	createUpstreamGuard,
	type UpstreamGuard,
} from './errors.js';
