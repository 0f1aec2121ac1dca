/**
 * Check Template Access Use Case
 *
 * Single-template verdict. An unknown template is a verdict, not an error.
 */

import type { UseCase } from '@template-sync/application';
import { Result, commandName } from '@template-sync/application';
import type { Logger } from '@template-sync/logging';

import {
	decideTemplateAccess,
	deniedRequiredTier,
	templateRequiredFeature,
	type AccessVerdict,
} from '../../../domain/index.js';
import type { TemplateCatalog } from '../../../infrastructure/persistence/index.js';
import type { UserDirectory } from '../../user-directory.js';
import { entitlementNotFound, workspaceUserNotFound } from '../errors.js';

import type { CheckTemplateAccessCommand } from './command.js';

export interface CheckTemplateAccessUseCaseDeps {
	readonly userDirectory: UserDirectory;
	readonly templateCatalog: TemplateCatalog;
	/** Where denied users are sent to upgrade */
	readonly upgradeUrl: string;
	readonly logger: Logger;
}

export function createCheckTemplateAccessUseCase(
	deps: CheckTemplateAccessUseCaseDeps,
): UseCase<CheckTemplateAccessCommand, AccessVerdict> {
	const { userDirectory, templateCatalog, upgradeUrl } = deps;
	const logger = deps.logger.child({ component: 'TemplateSync' });

	return {
		async execute(command: CheckTemplateAccessCommand): Promise<Result<AccessVerdict>> {
			const { userId, templateId } = command;
			const log = logger.child({ operation: commandName(command, 'CheckTemplateAccess'), userId, templateId });

			const entitlement = await userDirectory.getEntitlement(userId);
			if (!entitlement) {
				return Result.failure(entitlementNotFound(userId));
			}

			const workspaceUser = await userDirectory.resolveWorkspaceUser(entitlement);
			if (!workspaceUser) {
				return Result.failure(workspaceUserNotFound(userId));
			}

			const template = await templateCatalog.findAdminTemplate(templateId);
			if (!template) {
				log.info('Template not found');
				return Result.success({
					hasAccess: false,
					templateId,
					templateName: 'Unknown',
					reason: 'Template not found',
					denialKind: null,
					requiredTier: null,
					requiredFeature: null,
					upgradeUrl: null,
				});
			}

			const decision = decideTemplateAccess(template.metadata.access, entitlement);
			const requiredFeature = templateRequiredFeature(template.metadata.access);

			if (decision.granted) {
				return Result.success({
					hasAccess: true,
					templateId,
					templateName: template.name,
					reason: null,
					denialKind: null,
					requiredTier: null,
					requiredFeature,
					upgradeUrl: null,
				});
			}

			log.info({ denial: decision.denial.kind }, 'Template access denied');
			return Result.success({
				hasAccess: false,
				templateId,
				templateName: template.name,
				reason: decision.denial.reason,
				denialKind: decision.denial.kind,
				requiredTier: deniedRequiredTier(decision.denial),
				requiredFeature,
				upgradeUrl,
			});
		},
	};
}
