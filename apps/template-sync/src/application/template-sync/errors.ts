import { UseCaseError } from '@template-sync/application';

export function entitlementNotFound(userId: string): UseCaseError {
	return UseCaseError.notFound('ENTITLEMENT_NOT_FOUND', `User ${userId} not found in account store`, { userId });
}

export function workspaceUserNotFound(userId: string): UseCaseError {
	return UseCaseError.notFound('WORKSPACE_USER_NOT_FOUND', workspaceUserMissingMessage(userId), { userId });
}

export function workspaceUserMissingMessage(userId: string): string {
	return `User ${userId} not found in workspace store. The user must sign in to the workspace once before templates can be synced.`;
}
