/**
 * Account Store Schema
 *
 * Tables owned by the account system. Read only; this service never writes
 * them. `users.tenant_id` exists only on some deployments and is read with a
 * raw query after checking information_schema.
 */

import { pgTable, varchar, boolean, primaryKey } from 'drizzle-orm/pg-core';

export const accountUsers = pgTable('users', {
	id: varchar('id', { length: 64 }).primaryKey(),
	email: varchar('email', { length: 255 }),
	subscriptionTier: varchar('subscription_tier', { length: 50 }),
	isActive: boolean('is_active').notNull().default(true),
});

export const userWalkerAgents = pgTable(
	'user_walker_agents',
	{
		userId: varchar('user_id', { length: 64 }).notNull(),
		walkerAgentType: varchar('walker_agent_type', { length: 50 }).notNull(),
		enabled: boolean('enabled').notNull().default(false),
	},
	(table) => [primaryKey({ columns: [table.userId, table.walkerAgentType] })],
);

// Type inference
export type AccountUserRecord = typeof accountUsers.$inferSelect;
export type UserWalkerAgentRecord = typeof userWalkerAgents.$inferSelect;
