/**
 * Check Template Access Command
 */

import type { Command } from '@template-sync/application';

export interface CheckTemplateAccessCommand extends Command {
	readonly userId: string;
	readonly templateId: string;
}
