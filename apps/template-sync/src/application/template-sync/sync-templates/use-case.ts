/**
 * Sync User Templates Use Case
 *
 * Copies every template the user is entitled to into the root folder of
 * their workspace. Templates are reconciled one at a time in catalog order;
 * each check-then-copy runs under the (owner, template name) lock.
 *
 * A copy that fails is logged, counted in `failed` and left out of the
 * report; the remaining templates are still processed. Store outages abort
 * the whole call.
 */

import type { UseCase } from '@template-sync/application';
import { Result, commandName } from '@template-sync/application';
import type { Logger } from '@template-sync/logging';
import { UpstreamUnavailableError } from '@template-sync/persistence';

import {
	ALL_FEATURE_TYPES,
	sortedFeatures,
	type SyncedItem,
	type SyncResult,
	type Template,
	type UserEntitlement,
} from '../../../domain/index.js';
import type { TemplateCatalog, WorkspaceRepository } from '../../../infrastructure/persistence/index.js';
import type { UserDirectory } from '../../user-directory.js';
import { partitionByAccess, type DeniedTemplate } from '../access-partition.js';
import { entitlementNotFound, workspaceUserMissingMessage } from '../errors.js';

import type { SyncUserTemplatesCommand } from './command.js';

export interface SyncUserTemplatesUseCaseDeps {
	readonly userDirectory: UserDirectory;
	readonly templateCatalog: TemplateCatalog;
	readonly workspaceRepository: WorkspaceRepository;
	/** Name of the folder templates are copied into */
	readonly rootFolderName: string;
	readonly logger: Logger;
	readonly now?: () => Date;
}

type CopyOutcome = { readonly action: 'up-to-date' } | { readonly action: 'created' | 'updated'; readonly copyId: string };

function toDeniedItem({ template, denial }: DeniedTemplate): SyncedItem {
	return {
		templateId: template.id,
		copyId: '',
		name: template.name,
		version: template.metadata.version,
		folder: template.folderName ?? 'Unknown',
		action: 'denied',
		denialReason: denial.reason,
	};
}

function skippedResult(entitlement: UserEntitlement, syncedAt: Date): SyncResult {
	return {
		userId: entitlement.userId,
		syncedAt,
		status: 'skipped',
		message: workspaceUserMissingMessage(entitlement.userId),
		tier: entitlement.tier,
		enabledFeatures: sortedFeatures(entitlement.enabledFeatures, ALL_FEATURE_TYPES),
		created: [],
		updated: [],
		upToDate: 0,
		denied: [],
		failed: 0,
		foldersCreated: [],
		totals: { available: 0, accessible: 0, synced: 0 },
	};
}

export function createSyncUserTemplatesUseCase(
	deps: SyncUserTemplatesUseCaseDeps,
): UseCase<SyncUserTemplatesCommand, SyncResult> {
	const { userDirectory, templateCatalog, workspaceRepository, rootFolderName } = deps;
	const logger = deps.logger.child({ component: 'TemplateSync' });
	const now = deps.now ?? (() => new Date());

	return {
		async execute(command: SyncUserTemplatesCommand): Promise<Result<SyncResult>> {
			const { userId, forceSync } = command;
			const log = logger.child({ operation: commandName(command, 'SyncUserTemplates'), userId });

			const entitlement = await userDirectory.getEntitlement(userId);
			if (!entitlement) {
				return Result.failure(entitlementNotFound(userId));
			}

			log.info(
				{ tier: entitlement.tier, features: [...entitlement.enabledFeatures], forceSync },
				'Starting template sync',
			);

			const workspaceUser = await userDirectory.resolveWorkspaceUser(entitlement);
			if (!workspaceUser) {
				log.warn({ accountHandle: entitlement.accountHandle }, 'Workspace user not found, skipping sync');
				return Result.success(skippedResult(entitlement, now()));
			}

			const owner = workspaceUser.id;
			const folder = await workspaceRepository.getOrCreateFolder(owner, rootFolderName);

			const templates = await templateCatalog.listAdminTemplates();
			const { accessible, denied } = partitionByAccess(templates, entitlement);
			log.info(
				{ available: templates.length, accessible: accessible.length, denied: denied.length },
				'Access check complete',
			);

			const created: SyncedItem[] = [];
			const updated: SyncedItem[] = [];
			let upToDate = 0;
			let failed = 0;

			const toItem = (template: Template, action: 'created' | 'updated', copyId: string): SyncedItem => ({
				templateId: template.id,
				copyId,
				name: template.name,
				version: template.metadata.version,
				folder: rootFolderName,
				action,
				denialReason: null,
			});

			for (const template of accessible) {
				let outcome: CopyOutcome;
				try {
					outcome = await workspaceRepository.lockTemplateCopy<CopyOutcome>(owner, template.name, async (scope) => {
						const exists = await scope.templateCopyExists();
						if (exists && !forceSync) {
							return { action: 'up-to-date' };
						}
						const copyId = await scope.copyTemplate(template, folder.id);
						return { action: exists ? 'updated' : 'created', copyId };
					});
				} catch (error) {
					if (error instanceof UpstreamUnavailableError) throw error;
					failed++;
					log.error({ err: error, templateId: template.id, templateName: template.name }, 'Failed to copy template');
					continue;
				}

				switch (outcome.action) {
					case 'up-to-date':
						upToDate++;
						log.debug({ templateName: template.name }, 'Template copy already present');
						break;
					case 'created':
						created.push(toItem(template, 'created', outcome.copyId));
						break;
					case 'updated':
						updated.push(toItem(template, 'updated', outcome.copyId));
						break;
				}
			}

			const result: SyncResult = {
				userId,
				syncedAt: now(),
				status: 'success',
				message: null,
				tier: entitlement.tier,
				enabledFeatures: sortedFeatures(entitlement.enabledFeatures, ALL_FEATURE_TYPES),
				created,
				updated,
				upToDate,
				denied: denied.map(toDeniedItem),
				failed,
				foldersCreated: folder.created ? [rootFolderName] : [],
				totals: {
					available: templates.length,
					accessible: accessible.length,
					synced: created.length + upToDate,
				},
			};

			log.info(
				{ created: created.length, updated: updated.length, upToDate, denied: denied.length, failed },
				'Template sync completed',
			);

			return Result.success(result);
		},
	};
}
