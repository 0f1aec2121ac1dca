/**
 * Command Types
 *
 * Commands represent the input to a use case. They are plain, immutable data
 * objects carrying the intent and data for one operation.
 *
 * @example
 * ```typescript
 * interface SyncUserTemplatesCommand extends Command {
 *     readonly userId: string;
 *     readonly forceSync: boolean;
 * }
 * ```
 */

/**
 * Base marker interface for commands.
 */
export interface Command {
	/**
	 * Optional operation type identifier, used in logs.
	 */
	readonly _type?: string;
}

/**
 * Name of a command for logging: its `_type` when set, otherwise the fallback.
 */
export function commandName(command: Command, fallback: string): string {
	return command._type ?? fallback;
}
