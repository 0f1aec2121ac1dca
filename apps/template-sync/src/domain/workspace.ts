/**
 * Records owned by a user in the workspace store.
 */

export interface WorkspaceFolder {
	readonly id: string;
	readonly owner: string;
	readonly name: string;
	readonly parentId: string | null;
}

/**
 * Result of a get-or-create on a folder key.
 */
export interface FolderRef {
	readonly id: string;
	/** True only for the call that inserted the folder */
	readonly created: boolean;
}

export interface WorkspaceFlow {
	readonly id: string;
	readonly name: string;
	readonly folderId: string | null;
	readonly description: string | null;
	readonly updatedAt: Date | null;
}
