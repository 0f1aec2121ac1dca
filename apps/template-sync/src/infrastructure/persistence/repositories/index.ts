export { createAccountRepository, type AccountRepository } from './account-repository.js';
export { createWorkspaceUserRepository, type WorkspaceUserRepository } from './workspace-user-repository.js';
export { createTemplateCatalogRepository, type TemplateCatalog } from './template-catalog-repository.js';
export {
	createWorkspaceRepository,
	folderLockKey,
	templateCopyLockKey,
	type WorkspaceRepository,
	type TemplateCopyScope,
} from './workspace-repository.js';
