/**
 * Account Repository
 *
 * Read access to the account store: subscription tier, enabled walker agents
 * and the optional tenant of a user.
 */

import { eq, and, sql } from 'drizzle-orm';
import { createUpstreamGuard, type Db } from '@template-sync/persistence';

import { accountUsers, userWalkerAgents, type AccountUserRecord } from '../schema/index.js';

/**
 * Account repository interface.
 */
export interface AccountRepository {
	findUser(userId: string): Promise<AccountUserRecord | undefined>;
	/** Stored walker agent names the user has enabled, unparsed. */
	findEnabledWalkerAgents(userId: string): Promise<string[]>;
	/** Tenant of the user; null when unset or when the deployment has no tenant column. */
	findTenantId(userId: string): Promise<string | null>;
}

/**
 * Create an Account repository.
 */
export function createAccountRepository(db: Db): AccountRepository {
	const guard = createUpstreamGuard('account');
	let hasTenantColumn: boolean | undefined;

	async function tenantColumnExists(): Promise<boolean> {
		if (hasTenantColumn !== undefined) return hasTenantColumn;
		const rows = await db.execute<{ present: boolean }>(sql`
			select exists (
				select 1 from information_schema.columns
				where table_name = 'users' and column_name = 'tenant_id'
			) as present
		`);
		hasTenantColumn = rows[0]?.present === true;
		return hasTenantColumn;
	}

	return {
		async findUser(userId: string): Promise<AccountUserRecord | undefined> {
			const [record] = await guard(() => db.select().from(accountUsers).where(eq(accountUsers.id, userId)).limit(1));
			return record;
		},

		async findEnabledWalkerAgents(userId: string): Promise<string[]> {
			const records = await guard(() =>
				db
					.select({ walkerAgentType: userWalkerAgents.walkerAgentType })
					.from(userWalkerAgents)
					.where(and(eq(userWalkerAgents.userId, userId), eq(userWalkerAgents.enabled, true))),
			);
			return records.map((r) => r.walkerAgentType);
		},

		async findTenantId(userId: string): Promise<string | null> {
			return guard(async () => {
				if (!(await tenantColumnExists())) return null;
				const rows = await db.execute<{ tenant_id: unknown }>(sql`select tenant_id from users where id = ${userId}`);
				const tenantId = rows[0]?.tenant_id;
				return tenantId === null || tenantId === undefined ? null : String(tenantId);
			});
		},
	};
}
