/**
 * In-memory stand-ins for the account and workspace stores.
 */

import { randomUUID } from 'node:crypto';
import { isSuccess, type Result } from '@template-sync/application';
import { UpstreamUnavailableError } from '@template-sync/persistence';

import type { FolderRef, Template, WorkspaceFlow, WorkspaceUser } from '../../domain/index.js';
import type {
	AccountRepository,
	AccountUserRecord,
	TemplateCatalog,
	TemplateCopyScope,
	WorkspaceRepository,
	WorkspaceUserRepository,
} from '../../infrastructure/persistence/index.js';
import { cleanDescription, parseTemplateMetadata } from '../../infrastructure/catalog/template-metadata.js';

export function createInMemoryAccountRepository(): AccountRepository & {
	addUser(user: AccountUserRecord, walkerAgents?: string[], tenantId?: string | null): void;
	failWith(error: Error | undefined): void;
} {
	const users = new Map<string, { record: AccountUserRecord; walkerAgents: string[]; tenantId: string | null }>();
	let failure: Error | undefined;

	function check(): void {
		if (failure) throw failure;
	}

	return {
		addUser(record, walkerAgents = [], tenantId = null) {
			users.set(record.id, { record, walkerAgents, tenantId });
		},
		failWith(error) {
			failure = error;
		},
		async findUser(userId) {
			check();
			return users.get(userId)?.record;
		},
		async findEnabledWalkerAgents(userId) {
			check();
			return [...(users.get(userId)?.walkerAgents ?? [])];
		},
		async findTenantId(userId) {
			check();
			return users.get(userId)?.tenantId ?? null;
		},
	};
}

export function createInMemoryWorkspaceUserRepository(): WorkspaceUserRepository & {
	addUser(user: WorkspaceUser): void;
} {
	const users = new Map<string, WorkspaceUser>();
	return {
		addUser(user) {
			users.set(user.username, user);
		},
		async findByUsername(username) {
			return users.get(username);
		},
	};
}

export interface TemplateFixture {
	readonly id?: string;
	readonly name: string;
	readonly description?: string | null;
	readonly folderName?: string | null;
	readonly updatedAt?: Date | null;
	readonly data?: unknown;
}

export function makeTemplate(fixture: TemplateFixture): Template {
	const description = fixture.description ?? null;
	return {
		id: fixture.id ?? randomUUID(),
		name: fixture.name,
		data: fixture.data ?? { nodes: [], edges: [] },
		description,
		folderName: fixture.folderName === undefined ? 'Library' : fixture.folderName,
		updatedAt: fixture.updatedAt ?? null,
		metadata: parseTemplateMetadata(description),
	};
}

/**
 * Description carrying a metadata block.
 */
export function metadataDescription(block: Record<string, unknown>, userDescription = 'Template'): string {
	return JSON.stringify({ user_description: userDescription, template_metadata: block });
}

export function createInMemoryTemplateCatalog(templates: Template[] = []): TemplateCatalog & {
	templates: Template[];
	failWith(error: Error | undefined): void;
} {
	let failure: Error | undefined;
	const catalog = {
		templates,
		failWith(error: Error | undefined) {
			failure = error;
		},
		async listAdminTemplates(): Promise<Template[]> {
			if (failure) throw failure;
			return [...catalog.templates];
		},
		async findAdminTemplate(templateId: string): Promise<Template | undefined> {
			if (failure) throw failure;
			return catalog.templates.find((t) => t.id === templateId);
		},
	};
	return catalog;
}

interface StoredFolder {
	readonly id: string;
	readonly owner: string;
	readonly name: string;
	readonly parentId: string | null;
}

interface StoredFlow extends WorkspaceFlow {
	readonly owner: string;
	readonly data: unknown;
}

export interface InMemoryWorkspace extends WorkspaceRepository {
	readonly folders: StoredFolder[];
	readonly flows: StoredFlow[];
	/** Make copies of the named template throw this error. */
	failCopiesOf(templateName: string, error: Error): void;
	addFlow(owner: string, flow: Omit<WorkspaceFlow, 'id'> & { id?: string }): void;
}

export function createInMemoryWorkspaceRepository(now: () => Date = () => new Date()): InMemoryWorkspace {
	const folders: StoredFolder[] = [];
	const flows: StoredFlow[] = [];
	const copyFailures = new Map<string, Error>();
	const lockTails = new Map<string, Promise<void>>();

	async function withKeyLock<T>(key: string, work: () => Promise<T>): Promise<T> {
		const previous = lockTails.get(key) ?? Promise.resolve();
		let release: () => void = () => undefined;
		const current = new Promise<void>((resolve) => {
			release = resolve;
		});
		const tail = previous.then(() => current);
		lockTails.set(key, tail);

		await previous;
		try {
			return await work();
		} finally {
			release();
			if (lockTails.get(key) === tail) lockTails.delete(key);
		}
	}

	async function templateCopyExists(owner: string, templateName: string): Promise<boolean> {
		// Yield so concurrent callers interleave at the check.
		await Promise.resolve();
		return flows.some((f) => f.owner === owner && f.name === templateName);
	}

	async function copyTemplate(owner: string, template: Template, folderId: string): Promise<string> {
		await Promise.resolve();
		const failure = copyFailures.get(template.name);
		if (failure) throw failure;
		const id = randomUUID();
		const timestamp = now();
		flows.push({
			id,
			owner,
			name: template.name,
			folderId,
			description: cleanDescription(template.description),
			updatedAt: timestamp,
			data: template.data,
		});
		return id;
	}

	return {
		folders,
		flows,
		failCopiesOf(templateName, error) {
			copyFailures.set(templateName, error);
		},
		addFlow(owner, flow) {
			flows.push({ ...flow, id: flow.id ?? randomUUID(), owner, data: {} });
		},
		async getOrCreateFolder(owner, name, parentId = null): Promise<FolderRef> {
			return withKeyLock(`folder:${owner}:${parentId ?? '-'}:${name}`, async () => {
				await Promise.resolve();
				const existing = folders.find((f) => f.owner === owner && f.name === name && f.parentId === parentId);
				if (existing) return { id: existing.id, created: false };
				const folder = { id: randomUUID(), owner, name, parentId };
				folders.push(folder);
				return { id: folder.id, created: true };
			});
		},
		templateCopyExists,
		copyTemplate,
		async listUserTemplates(owner) {
			return flows
				.filter((f) => f.owner === owner)
				.map(({ id, name, folderId, description, updatedAt }) => ({ id, name, folderId, description, updatedAt }));
		},
		async lockTemplateCopy<T>(owner: string, templateName: string, work: (scope: TemplateCopyScope) => Promise<T>) {
			return withKeyLock(`template-copy:${owner}:${templateName}`, () =>
				work({
					templateCopyExists: () => templateCopyExists(owner, templateName),
					copyTemplate: (template, folderId) => copyTemplate(owner, template, folderId),
				}),
			);
		},
	};
}

export function upstreamDown(store = 'workspace'): UpstreamUnavailableError {
	return new UpstreamUnavailableError(store, Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }));
}

export function accountUser(id: string, email: string | null, subscriptionTier: string | null): AccountUserRecord {
	return { id, email, subscriptionTier, isActive: true };
}

export function unwrap<T>(result: Result<T>): T {
	if (!isSuccess(result)) {
		throw new Error(`Expected success, got ${result.error.code}`);
	}
	return result.value;
}
