/**
 * Workspace Store Schema
 *
 * Existing tables of the workspace application. Templates are the flows owned
 * by the template-admin account; user copies are flows owned by the user.
 */

import { pgTable, uuid, varchar, text, boolean, json, timestamp, index } from 'drizzle-orm/pg-core';

export const workspaceUsers = pgTable('user', {
	id: uuid('id').primaryKey(),
	username: varchar('username', { length: 255 }).notNull(),
	isSuperuser: boolean('is_superuser').notNull().default(false),
	isActive: boolean('is_active').notNull().default(true),
	lastLoginAt: timestamp('last_login_at', { withTimezone: true }),
});

export const folders = pgTable(
	'folder',
	{
		id: uuid('id').primaryKey(),
		name: varchar('name', { length: 255 }).notNull(),
		description: text('description'),
		userId: uuid('user_id'),
		parentId: uuid('parent_id'),
	},
	(table) => [index('idx_folder_user_name').on(table.userId, table.name)],
);

export const flows = pgTable(
	'flow',
	{
		id: uuid('id').primaryKey(),
		name: varchar('name', { length: 255 }).notNull(),
		description: text('description'),
		data: json('data'),
		userId: uuid('user_id'),
		folderId: uuid('folder_id'),
		createdAt: timestamp('created_at', { withTimezone: true }),
		updatedAt: timestamp('updated_at', { withTimezone: true }),
	},
	(table) => [index('idx_flow_user_name').on(table.userId, table.name)],
);

// Type inference
export type WorkspaceUserRecord = typeof workspaceUsers.$inferSelect;
export type FolderRecord = typeof folders.$inferSelect;
export type NewFolderRecord = typeof folders.$inferInsert;
export type FlowRecord = typeof flows.$inferSelect;
export type NewFlowRecord = typeof flows.$inferInsert;
