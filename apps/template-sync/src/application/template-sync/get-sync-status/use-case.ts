/**
 * Get Sync Status Use Case
 *
 * Read-only view of where a user's workspace stands against the catalog.
 * Nothing is written.
 */

import type { UseCase } from '@template-sync/application';
import { Result, commandName } from '@template-sync/application';
import type { Logger } from '@template-sync/logging';

import {
	ALL_FEATURE_TYPES,
	sortedFeatures,
	templateRequiredFeature,
	type SyncStatusSnapshot,
	type Template,
	type UpgradeOpportunity,
	type WorkspaceFlow,
} from '../../../domain/index.js';
import type { TemplateCatalog, WorkspaceRepository } from '../../../infrastructure/persistence/index.js';
import type { UserDirectory } from '../../user-directory.js';
import { partitionByAccess, type DeniedTemplate } from '../access-partition.js';
import { entitlementNotFound, workspaceUserNotFound } from '../errors.js';

import type { GetSyncStatusCommand } from './command.js';

export interface GetSyncStatusUseCaseDeps {
	readonly userDirectory: UserDirectory;
	readonly templateCatalog: TemplateCatalog;
	readonly workspaceRepository: WorkspaceRepository;
	readonly logger: Logger;
}

function latestUpdate(flows: readonly WorkspaceFlow[]): Date | null {
	let latest: Date | null = null;
	for (const flow of flows) {
		if (flow.updatedAt && (latest === null || flow.updatedAt > latest)) {
			latest = flow.updatedAt;
		}
	}
	return latest;
}

/**
 * Accessible templates that have a copy older than the template itself.
 */
function countPendingUpdates(accessible: readonly Template[], copiesByName: ReadonlyMap<string, WorkspaceFlow[]>): number {
	let pending = 0;
	for (const template of accessible) {
		const copies = copiesByName.get(template.name);
		if (!copies || !template.updatedAt) continue;
		const copiedAt = latestUpdate(copies);
		if (copiedAt !== null && copiedAt < template.updatedAt) pending++;
	}
	return pending;
}

function toUpgradeOpportunities(denied: readonly DeniedTemplate[]): UpgradeOpportunity[] {
	const opportunities: UpgradeOpportunity[] = [];
	for (const { template, denial } of denied) {
		if (denial.kind !== 'tier_too_low') continue;
		opportunities.push({
			templateId: template.id,
			templateName: template.name,
			requiredTier: denial.requiredTier,
			requiredFeature: templateRequiredFeature(template.metadata.access),
			features: template.metadata.features,
			reason: denial.reason,
		});
	}
	return opportunities;
}

export function createGetSyncStatusUseCase(
	deps: GetSyncStatusUseCaseDeps,
): UseCase<GetSyncStatusCommand, SyncStatusSnapshot> {
	const { userDirectory, templateCatalog, workspaceRepository } = deps;
	const logger = deps.logger.child({ component: 'TemplateSync' });

	return {
		async execute(command: GetSyncStatusCommand): Promise<Result<SyncStatusSnapshot>> {
			const { userId } = command;
			const log = logger.child({ operation: commandName(command, 'GetSyncStatus'), userId });

			const entitlement = await userDirectory.getEntitlement(userId);
			if (!entitlement) {
				return Result.failure(entitlementNotFound(userId));
			}

			const workspaceUser = await userDirectory.resolveWorkspaceUser(entitlement);
			if (!workspaceUser) {
				return Result.failure(workspaceUserNotFound(userId));
			}

			const templates = await templateCatalog.listAdminTemplates();
			const userFlows = await workspaceRepository.listUserTemplates(workspaceUser.id);
			const { accessible, denied } = partitionByAccess(templates, entitlement);

			const templateNames = new Set(templates.map((t) => t.name));
			const copiesByName = new Map<string, WorkspaceFlow[]>();
			for (const flow of userFlows) {
				if (!templateNames.has(flow.name)) continue;
				const copies = copiesByName.get(flow.name);
				if (copies) {
					copies.push(flow);
				} else {
					copiesByName.set(flow.name, [flow]);
				}
			}
			const templateFlows = [...copiesByName.values()].flat();

			const snapshot: SyncStatusSnapshot = {
				userId,
				tier: entitlement.tier,
				enabledFeatures: sortedFeatures(entitlement.enabledFeatures, ALL_FEATURE_TYPES),
				tierLimits: entitlement.tierLimits,
				isActive: entitlement.isActive,
				lastSyncAt: latestUpdate(templateFlows),
				totalFlows: userFlows.length,
				templateFlows: templateFlows.length,
				customFlows: userFlows.length - templateFlows.length,
				availableTemplates: templates.length,
				accessibleTemplates: accessible.length,
				pendingUpdates: countPendingUpdates(accessible, copiesByName),
				deniedTemplates: denied.length,
				upgradeOpportunities: toUpgradeOpportunities(denied),
			};

			log.debug({ accessible: snapshot.accessibleTemplates, denied: snapshot.deniedTemplates }, 'Computed sync status');
			return Result.success(snapshot);
		},
	};
}
