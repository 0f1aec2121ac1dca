/**
 * Get Sync Status Command
 */

import type { Command } from '@template-sync/application';

export interface GetSyncStatusCommand extends Command {
	readonly userId: string;
}
