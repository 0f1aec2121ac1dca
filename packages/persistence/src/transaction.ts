/**
 * Transaction Management
 *
 * Transaction context and utilities for atomic database operations.
 * Uses postgres.js transactions with DrizzleORM.
 */

import { sql } from 'drizzle-orm';
import type { Db } from './connection.js';

/**
 * Transaction context passed to repository operations.
 * Contains the database instance scoped to the current transaction.
 */
export interface TransactionContext {
	/** DrizzleORM database instance scoped to this transaction */
	readonly db: Db;
}

/**
 * Transaction manager for executing atomic operations.
 */
export interface TransactionManager {
	/**
	 * Execute a function within a database transaction.
	 * If the function throws, the transaction is rolled back.
	 * If the function returns, the transaction is committed.
	 */
	inTransaction<T>(fn: (tx: TransactionContext) => Promise<T>): Promise<T>;

	/**
	 * Execute a function within a transaction that first takes an exclusive
	 * advisory lock on `key`. Concurrent callers with the same key, in this
	 * process or any other connected to the same database, run one at a time.
	 * The lock is released when the transaction ends.
	 */
	withAdvisoryLock<T>(key: string, fn: (tx: TransactionContext) => Promise<T>): Promise<T>;
}

/**
 * Take a transaction-scoped advisory lock keyed by the hash of `key`.
 */
async function acquireAdvisoryLock(tx: TransactionContext, key: string): Promise<void> {
	await tx.db.execute(sql`select pg_advisory_xact_lock(hashtextextended(${key}, 0))`);
}

/**
 * Create a transaction manager from a DrizzleORM database instance.
 */
export function createTransactionManager(db: Db): TransactionManager {
	async function inTransaction<T>(fn: (tx: TransactionContext) => Promise<T>): Promise<T> {
		return db.transaction(async (tx) => fn({ db: tx }));
	}

	return {
		inTransaction,
		async withAdvisoryLock<T>(key: string, fn: (tx: TransactionContext) => Promise<T>): Promise<T> {
			return inTransaction(async (tx) => {
				await acquireAdvisoryLock(tx, key);
				return fn(tx);
			});
		},
	};
}

/**
 * Resolve the database instance from a transaction context or fall back to default.
 */
export function resolveDb(defaultDb: Db, tx?: TransactionContext): Db {
	return tx?.db ?? defaultDb;
}
