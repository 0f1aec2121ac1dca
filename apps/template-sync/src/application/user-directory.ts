/**
 * User Directory
 *
 * Resolves a user id to an entitlement from the account store, and the
 * entitlement to the same person's account in the workspace store. The two
 * stores assign different ids; the email is the cross-reference.
 */

import type { Logger } from '@template-sync/logging';

import {
	parseFeatureType,
	parseSubscriptionTier,
	resolveSubscriptionTier,
	tierLimits,
	type FeatureType,
	type UserEntitlement,
	type WorkspaceUser,
} from '../domain/index.js';
import type { AccountRepository, WorkspaceUserRepository } from '../infrastructure/persistence/index.js';

export interface UserDirectory {
	/** Undefined when the account store has no such user. */
	getEntitlement(userId: string): Promise<UserEntitlement | undefined>;
	/** Undefined when the user has no workspace account yet (or no email to find it by). */
	resolveWorkspaceUser(entitlement: UserEntitlement): Promise<WorkspaceUser | undefined>;
}

export interface UserDirectoryDeps {
	readonly accountRepository: AccountRepository;
	readonly workspaceUserRepository: WorkspaceUserRepository;
	readonly logger: Logger;
}

export function createUserDirectory(deps: UserDirectoryDeps): UserDirectory {
	const { accountRepository, workspaceUserRepository } = deps;
	const logger = deps.logger.child({ component: 'UserDirectory' });

	return {
		async getEntitlement(userId: string): Promise<UserEntitlement | undefined> {
			const user = await accountRepository.findUser(userId);
			if (!user) {
				logger.warn({ userId }, 'User not found in account store');
				return undefined;
			}

			if (resolveSubscriptionTier(user.subscriptionTier) === undefined) {
				logger.warn({ userId, subscriptionTier: user.subscriptionTier }, 'Unknown subscription tier, using lowest tier');
			}
			const tier = parseSubscriptionTier(user.subscriptionTier);

			const enabledFeatures = new Set<FeatureType>();
			for (const raw of await accountRepository.findEnabledWalkerAgents(userId)) {
				const feature = parseFeatureType(raw);
				if (feature === undefined) {
					logger.warn({ userId, walkerAgentType: raw }, 'Ignoring unknown walker agent type');
					continue;
				}
				enabledFeatures.add(feature);
			}

			const tenantId = await accountRepository.findTenantId(userId);

			return {
				userId: user.id,
				accountHandle: user.email,
				tier,
				enabledFeatures,
				tierLimits: tierLimits(tier),
				isActive: user.isActive,
				tenantId,
			};
		},

		async resolveWorkspaceUser(entitlement: UserEntitlement): Promise<WorkspaceUser | undefined> {
			if (!entitlement.accountHandle) {
				logger.warn({ userId: entitlement.userId }, 'User has no email to locate a workspace account');
				return undefined;
			}
			return workspaceUserRepository.findByUsername(entitlement.accountHandle);
		},
	};
}
