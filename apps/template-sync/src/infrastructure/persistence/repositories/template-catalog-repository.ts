/**
 * Template Catalog Repository
 *
 * Reads the templates owned by the template-admin workspace account. Access
 * metadata is parsed here so nothing downstream sees the description layout.
 */

import { and, asc, eq } from 'drizzle-orm';
import { createUpstreamGuard, type Db } from '@template-sync/persistence';

import { flows, folders, workspaceUsers } from '../schema/index.js';
import { parseTemplateMetadata } from '../../catalog/template-metadata.js';
import type { Template } from '../../../domain/index.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export interface TemplateCatalog {
	/** Every admin template, ordered by folder name then template name. */
	listAdminTemplates(): Promise<Template[]>;
	findAdminTemplate(templateId: string): Promise<Template | undefined>;
}

interface TemplateRow {
	id: string;
	name: string;
	data: unknown;
	description: string | null;
	folderName: string | null;
	updatedAt: Date | null;
}

function rowToTemplate(row: TemplateRow): Template {
	return {
		id: row.id,
		name: row.name,
		data: row.data,
		description: row.description,
		folderName: row.folderName,
		updatedAt: row.updatedAt,
		metadata: parseTemplateMetadata(row.description),
	};
}

/**
 * Create a Template Catalog backed by the workspace store.
 */
export function createTemplateCatalogRepository(db: Db, adminUsername: string): TemplateCatalog {
	const guard = createUpstreamGuard('workspace');

	function selectTemplates() {
		return db
			.select({
				id: flows.id,
				name: flows.name,
				data: flows.data,
				description: flows.description,
				folderName: folders.name,
				updatedAt: flows.updatedAt,
			})
			.from(flows)
			.innerJoin(workspaceUsers, eq(flows.userId, workspaceUsers.id))
			.leftJoin(folders, eq(flows.folderId, folders.id));
	}

	return {
		async listAdminTemplates(): Promise<Template[]> {
			const rows = await guard(() =>
				selectTemplates().where(eq(workspaceUsers.username, adminUsername)).orderBy(asc(folders.name), asc(flows.name)),
			);
			return rows.map(rowToTemplate);
		},

		async findAdminTemplate(templateId: string): Promise<Template | undefined> {
			if (!UUID_PATTERN.test(templateId)) return undefined;
			const [row] = await guard(() =>
				selectTemplates()
					.where(and(eq(flows.id, templateId), eq(workspaceUsers.username, adminUsername)))
					.limit(1),
			);
			return row ? rowToTemplate(row) : undefined;
		},
	};
}
