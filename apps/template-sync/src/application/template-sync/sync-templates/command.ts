/**
 * Sync User Templates Command
 */

import type { Command } from '@template-sync/application';

export interface SyncUserTemplatesCommand extends Command {
	readonly userId: string;
	/** Copy accessible templates again even when a same-named copy exists */
	readonly forceSync: boolean;
}
