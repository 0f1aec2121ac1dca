/**
 * Template Sync Application Layer
 */

export type { SyncUserTemplatesCommand } from './sync-templates/command.js';
export {
	type SyncUserTemplatesUseCaseDeps,
	createSyncUserTemplatesUseCase,
} from './sync-templates/use-case.js';

export type { GetSyncStatusCommand } from './get-sync-status/command.js';
export {
	type GetSyncStatusUseCaseDeps,
	createGetSyncStatusUseCase,
} from './get-sync-status/use-case.js';

export type { CheckTemplateAccessCommand } from './check-template-access/command.js';
export {
	type CheckTemplateAccessUseCaseDeps,
	createCheckTemplateAccessUseCase,
} from './check-template-access/use-case.js';

export { partitionByAccess, type AccessPartition, type DeniedTemplate } from './access-partition.js';
