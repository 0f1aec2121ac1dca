/**
 * Workspace User Repository
 */

import { eq } from 'drizzle-orm';
import { createUpstreamGuard, type Db } from '@template-sync/persistence';

import { workspaceUsers } from '../schema/index.js';
import type { WorkspaceUser } from '../../../domain/index.js';

export interface WorkspaceUserRepository {
	findByUsername(username: string): Promise<WorkspaceUser | undefined>;
}

export function createWorkspaceUserRepository(db: Db): WorkspaceUserRepository {
	const guard = createUpstreamGuard('workspace');

	return {
		async findByUsername(username: string): Promise<WorkspaceUser | undefined> {
			const [record] = await guard(() =>
				db
					.select({ id: workspaceUsers.id, username: workspaceUsers.username, isActive: workspaceUsers.isActive })
					.from(workspaceUsers)
					.where(eq(workspaceUsers.username, username))
					.limit(1),
			);
			return record;
		},
	};
}
