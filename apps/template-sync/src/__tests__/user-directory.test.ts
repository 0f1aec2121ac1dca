import { describe, it, expect, beforeEach } from 'vitest';
import { createSilentLogger } from '@template-sync/logging';

import { createUserDirectory, type UserDirectory } from '../application/index.js';
import {
	accountUser,
	createInMemoryAccountRepository,
	createInMemoryWorkspaceUserRepository,
} from './support/in-memory.js';

describe('UserDirectory', () => {
	let accounts: ReturnType<typeof createInMemoryAccountRepository>;
	let workspaceUsers: ReturnType<typeof createInMemoryWorkspaceUserRepository>;
	let directory: UserDirectory;

	beforeEach(() => {
		accounts = createInMemoryAccountRepository();
		workspaceUsers = createInMemoryWorkspaceUserRepository();
		directory = createUserDirectory({
			accountRepository: accounts,
			workspaceUserRepository: workspaceUsers,
			logger: createSilentLogger(),
		});
	});

	it('should return undefined for an unknown user', async () => {
		expect(await directory.getEntitlement('missing')).toBeUndefined();
	});

	it('should resolve tier, features, limits and tenant', async () => {
		accounts.addUser(accountUser('acct-1', 'ada@example.com', 'Pro'), ['paid_ads', 'SEO'], 'tenant-9');

		const entitlement = await directory.getEntitlement('acct-1');

		expect(entitlement).toEqual({
			userId: 'acct-1',
			accountHandle: 'ada@example.com',
			tier: 'professional',
			enabledFeatures: new Set(['paid_ads', 'seo']),
			tierLimits: { maxFlows: 50, maxWalkerAgents: 2, maxCampaigns: 10, apiRateLimit: 1000 },
			isActive: true,
			tenantId: 'tenant-9',
		});
	});

	it('should drop unknown walker agents and fall back to the lowest tier', async () => {
		accounts.addUser(accountUser('acct-2', 'bo@example.com', 'platinum'), ['crm', 'content']);

		const entitlement = await directory.getEntitlement('acct-2');

		expect(entitlement?.tier).toBe('starter');
		expect([...(entitlement?.enabledFeatures ?? [])]).toEqual(['content']);
		expect(entitlement?.tenantId).toBeNull();
	});

	it('should find the workspace user by email', async () => {
		accounts.addUser(accountUser('acct-3', 'cy@example.com', 'business'));
		workspaceUsers.addUser({ id: 'ws-3', username: 'cy@example.com', isActive: true });

		const entitlement = await directory.getEntitlement('acct-3');
		if (!entitlement) throw new Error('expected entitlement');

		expect(await directory.resolveWorkspaceUser(entitlement)).toEqual({
			id: 'ws-3',
			username: 'cy@example.com',
			isActive: true,
		});
	});

	it('should not look up a workspace user without an email', async () => {
		accounts.addUser(accountUser('acct-4', null, 'business'));

		const entitlement = await directory.getEntitlement('acct-4');
		if (!entitlement) throw new Error('expected entitlement');

		expect(await directory.resolveWorkspaceUser(entitlement)).toBeUndefined();
	});
});
