import { describe, it, expect, beforeEach } from 'vitest';
import { createSilentLogger } from '@template-sync/logging';

import { createGetSyncStatusUseCase, createUserDirectory } from '../application/index.js';
import type { Template } from '../domain/index.js';
import {
	accountUser,
	createInMemoryAccountRepository,
	createInMemoryTemplateCatalog,
	createInMemoryWorkspaceRepository,
	createInMemoryWorkspaceUserRepository,
	makeTemplate,
	metadataDescription,
	unwrap,
	type InMemoryWorkspace,
} from './support/in-memory.js';

describe('GetSyncStatusUseCase', () => {
	let keywordReport: Template;
	let adsOptimizer: Template;
	let audienceBuilder: Template;
	let accounts: ReturnType<typeof createInMemoryAccountRepository>;
	let workspaceUsers: ReturnType<typeof createInMemoryWorkspaceUserRepository>;
	let workspace: InMemoryWorkspace;

	function createUseCase() {
		const logger = createSilentLogger();
		return createGetSyncStatusUseCase({
			userDirectory: createUserDirectory({ accountRepository: accounts, workspaceUserRepository: workspaceUsers, logger }),
			templateCatalog: createInMemoryTemplateCatalog([keywordReport, adsOptimizer, audienceBuilder]),
			workspaceRepository: workspace,
			logger,
		});
	}

	beforeEach(() => {
		keywordReport = makeTemplate({ name: 'Keyword Report', updatedAt: new Date('2026-02-01T00:00:00Z') });
		adsOptimizer = makeTemplate({
			name: 'Ads Optimizer',
			updatedAt: new Date('2026-02-10T00:00:00Z'),
			description: metadataDescription({
				required_tier: 'professional',
				walker_agent_type: 'paid_ads',
				category: 'walker_agents',
				features: ['bid_tuning'],
			}),
		});
		audienceBuilder = makeTemplate({
			name: 'Audience Builder',
			description: metadataDescription({
				required_tier: 'business',
				walker_agent_type: 'audience_intelligence',
				category: 'walker_agents',
				features: ['lookalikes', 'segments'],
			}),
		});

		accounts = createInMemoryAccountRepository();
		accounts.addUser(accountUser('acct-1', 'ada@example.com', 'pro'), ['paid_ads']);
		workspaceUsers = createInMemoryWorkspaceUserRepository();
		workspaceUsers.addUser({ id: 'ws-1', username: 'ada@example.com', isActive: true });
		workspace = createInMemoryWorkspaceRepository();
	});

	it('should summarise copies, custom flows and upgrade opportunities', async () => {
		workspace.addFlow('ws-1', {
			name: 'Keyword Report',
			folderId: null,
			description: null,
			updatedAt: new Date('2026-02-05T00:00:00Z'),
		});
		workspace.addFlow('ws-1', {
			name: 'Ads Optimizer',
			folderId: null,
			description: null,
			updatedAt: new Date('2026-02-03T00:00:00Z'),
		});
		workspace.addFlow('ws-1', { name: 'My Own Flow', folderId: null, description: null, updatedAt: new Date('2026-03-01T00:00:00Z') });
		workspace.addFlow('ws-other', { name: 'Keyword Report', folderId: null, description: null, updatedAt: null });

		const snapshot = unwrap(await createUseCase().execute({ userId: 'acct-1' }));

		expect(snapshot).toEqual({
			userId: 'acct-1',
			tier: 'professional',
			enabledFeatures: ['paid_ads'],
			tierLimits: { maxFlows: 50, maxWalkerAgents: 2, maxCampaigns: 10, apiRateLimit: 1000 },
			isActive: true,
			lastSyncAt: new Date('2026-02-05T00:00:00Z'),
			totalFlows: 3,
			templateFlows: 2,
			customFlows: 1,
			availableTemplates: 3,
			accessibleTemplates: 2,
			pendingUpdates: 1,
			deniedTemplates: 1,
			upgradeOpportunities: [
				{
					templateId: audienceBuilder.id,
					templateName: 'Audience Builder',
					requiredTier: 'business',
					requiredFeature: 'audience_intelligence',
					features: ['lookalikes', 'segments'],
					reason: 'Requires business tier or higher (current: professional)',
				},
			],
		});
	});

	it('should report an empty workspace without pending updates', async () => {
		const snapshot = unwrap(await createUseCase().execute({ userId: 'acct-1' }));

		expect(snapshot.lastSyncAt).toBeNull();
		expect(snapshot.totalFlows).toBe(0);
		expect(snapshot.pendingUpdates).toBe(0);
	});

	it('should leave feature denials out of upgrade opportunities', async () => {
		accounts.addUser(accountUser('acct-2', 'bo@example.com', 'business'), []);
		workspaceUsers.addUser({ id: 'ws-2', username: 'bo@example.com', isActive: true });

		const snapshot = unwrap(await createUseCase().execute({ userId: 'acct-2' }));

		expect(snapshot.deniedTemplates).toBe(2);
		expect(snapshot.upgradeOpportunities).toEqual([]);
	});

	it('should fail for users missing from either store', async () => {
		accounts.addUser(accountUser('acct-3', 'new@example.com', 'starter'));

		const missingAccount = await createUseCase().execute({ userId: 'nobody' });
		const missingWorkspace = await createUseCase().execute({ userId: 'acct-3' });

		expect(missingAccount._tag === 'failure' && missingAccount.error.code).toBe('ENTITLEMENT_NOT_FOUND');
		expect(missingWorkspace._tag === 'failure' && missingWorkspace.error.code).toBe('WORKSPACE_USER_NOT_FOUND');
	});
});
