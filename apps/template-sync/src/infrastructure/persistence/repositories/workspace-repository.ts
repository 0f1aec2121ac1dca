/**
 * Workspace Repository
 *
 * Folders and template copies owned by a user in the workspace store.
 *
 * Folder creation and check-then-copy are each serialized per key with a
 * transaction-scoped advisory lock, so concurrent syncs for the same user
 * cannot create a folder twice or copy the same template twice.
 */

import { randomUUID } from 'node:crypto';
import { and, asc, eq, isNull } from 'drizzle-orm';
import {
	createTransactionManager,
	createUpstreamGuard,
	resolveDb,
	type Db,
	type TransactionContext,
} from '@template-sync/persistence';

import { flows, folders } from '../schema/index.js';
import { cleanDescription } from '../../catalog/template-metadata.js';
import type { FolderRef, Template, WorkspaceFlow } from '../../../domain/index.js';

/**
 * Existence check and copy bound to one (owner, template name) lock.
 */
export interface TemplateCopyScope {
	templateCopyExists(): Promise<boolean>;
	copyTemplate(template: Template, folderId: string): Promise<string>;
}

/**
 * Workspace repository interface.
 */
export interface WorkspaceRepository {
	/** Find the folder with this key or create it. */
	getOrCreateFolder(owner: string, name: string, parentId?: string | null): Promise<FolderRef>;
	/** Whether the owner already has a flow with this name. */
	templateCopyExists(owner: string, templateName: string): Promise<boolean>;
	/** Insert a new copy of the template; never checks for an existing one. Returns the copy id. */
	copyTemplate(owner: string, template: Template, folderId: string): Promise<string>;
	listUserTemplates(owner: string): Promise<WorkspaceFlow[]>;
	/** Run `work` while holding the (owner, template name) lock. */
	lockTemplateCopy<T>(owner: string, templateName: string, work: (scope: TemplateCopyScope) => Promise<T>): Promise<T>;
}

export function folderLockKey(owner: string, name: string, parentId: string | null): string {
	return `folder:${owner}:${parentId ?? '-'}:${name}`;
}

export function templateCopyLockKey(owner: string, templateName: string): string {
	return `template-copy:${owner}:${templateName}`;
}

/**
 * Create a Workspace repository.
 */
export function createWorkspaceRepository(defaultDb: Db): WorkspaceRepository {
	const guard = createUpstreamGuard('workspace');
	const transactionManager = createTransactionManager(defaultDb);

	async function findFolderId(
		owner: string,
		name: string,
		parentId: string | null,
		tx?: TransactionContext,
	): Promise<string | undefined> {
		const [record] = await resolveDb(defaultDb, tx)
			.select({ id: folders.id })
			.from(folders)
			.where(
				and(
					eq(folders.userId, owner),
					eq(folders.name, name),
					parentId === null ? isNull(folders.parentId) : eq(folders.parentId, parentId),
				),
			)
			.limit(1);
		return record?.id;
	}

	async function copyExists(owner: string, templateName: string, tx?: TransactionContext): Promise<boolean> {
		const [record] = await resolveDb(defaultDb, tx)
			.select({ id: flows.id })
			.from(flows)
			.where(and(eq(flows.userId, owner), eq(flows.name, templateName)))
			.limit(1);
		return record !== undefined;
	}

	async function insertCopy(owner: string, template: Template, folderId: string, tx?: TransactionContext): Promise<string> {
		const id = randomUUID();
		const now = new Date();
		await resolveDb(defaultDb, tx)
			.insert(flows)
			.values({
				id,
				userId: owner,
				name: template.name,
				description: cleanDescription(template.description),
				data: template.data,
				folderId,
				createdAt: now,
				updatedAt: now,
			});
		return id;
	}

	return {
		async getOrCreateFolder(owner: string, name: string, parentId: string | null = null): Promise<FolderRef> {
			return guard(() =>
				transactionManager.withAdvisoryLock(folderLockKey(owner, name, parentId), async (tx) => {
					const existingId = await findFolderId(owner, name, parentId, tx);
					if (existingId !== undefined) {
						return { id: existingId, created: false };
					}

					const id = randomUUID();
					await tx.db.insert(folders).values({ id, name, userId: owner, parentId });
					return { id, created: true };
				}),
			);
		},

		async templateCopyExists(owner: string, templateName: string): Promise<boolean> {
			return guard(() => copyExists(owner, templateName));
		},

		async copyTemplate(owner: string, template: Template, folderId: string): Promise<string> {
			return guard(() => insertCopy(owner, template, folderId));
		},

		async listUserTemplates(owner: string): Promise<WorkspaceFlow[]> {
			return guard(() =>
				defaultDb
					.select({
						id: flows.id,
						name: flows.name,
						folderId: flows.folderId,
						description: flows.description,
						updatedAt: flows.updatedAt,
					})
					.from(flows)
					.where(eq(flows.userId, owner))
					.orderBy(asc(flows.name)),
			);
		},

		async lockTemplateCopy<T>(
			owner: string,
			templateName: string,
			work: (scope: TemplateCopyScope) => Promise<T>,
		): Promise<T> {
			return guard(() =>
				transactionManager.withAdvisoryLock(templateCopyLockKey(owner, templateName), (tx) =>
					work({
						templateCopyExists: () => copyExists(owner, templateName, tx),
						copyTemplate: (template, folderId) => insertCopy(owner, template, folderId, tx),
					}),
				),
			);
		},
	};
}
