/**
 * Upstream Failures
 *
 * Classifies driver errors that mean "the store could not answer" (refused or
 * dropped connections, timeouts, server shutdown) and re-raises them as
 * UpstreamUnavailableError so the HTTP layer can report them separately from
 * bugs and bad input.
 */

/** Client-side error codes raised by postgres.js and the socket layer. */
const CONNECTION_ERROR_CODES = new Set([
	'ECONNREFUSED',
	'ECONNRESET',
	'ENOTFOUND',
	'EHOSTUNREACH',
	'ETIMEDOUT',
	'EPIPE',
	'CONNECT_TIMEOUT',
	'CONNECTION_CLOSED',
	'CONNECTION_ENDED',
	'CONNECTION_DESTROYED',
]);

/** SQLSTATE codes (and class prefixes) that mean the server cannot serve us. */
const UNAVAILABLE_SQLSTATES = new Set(['57014', '57P01', '57P02', '57P03', '53300']);
const UNAVAILABLE_SQLSTATE_CLASSES = ['08'];

/**
 * A backing store could not be reached or did not answer in time.
 */
export class UpstreamUnavailableError extends Error {
	readonly store: string;

	constructor(store: string, cause: unknown) {
		super(`${store} store is unavailable`, { cause });
		this.name = 'UpstreamUnavailableError';
		this.store = store;
	}
}

function errorCode(error: unknown): string | undefined {
	if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
	return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Check whether an error (or the error it wraps) is a connectivity or
 * deadline failure rather than a query or data problem.
 */
export function isUpstreamFailure(error: unknown): boolean {
	let current: unknown = error;
	for (let depth = 0; depth < 3 && current !== undefined && current !== null; depth++) {
		if (current instanceof UpstreamUnavailableError) return true;

		const code = errorCode(current);
		if (code !== undefined) {
			if (CONNECTION_ERROR_CODES.has(code) || UNAVAILABLE_SQLSTATES.has(code)) return true;
			if (code.length === 5 && UNAVAILABLE_SQLSTATE_CLASSES.some((prefix) => code.startsWith(prefix))) {
				return true;
			}
		}

		current = current instanceof Error ? current.cause : undefined;
	}
	return false;
}

/**
 * Wrapper applied around every query of one store.
 */
export type UpstreamGuard = <T>(operation: () => Promise<T>) => Promise<T>;

/**
 * Create a guard that converts upstream failures of `store` into
 * UpstreamUnavailableError and lets every other error through unchanged.
 *
 * @example
 * ```typescript
 * const guard = createUpstreamGuard('account');
 * const rows = await guard(() => db.select().from(users).where(eq(users.id, userId)));
 * ```
 */
export function createUpstreamGuard(store: string): UpstreamGuard {
	return async <T>(operation: () => Promise<T>): Promise<T> => {
		try {
			return await operation();
		} catch (error) {
			if (error instanceof UpstreamUnavailableError) throw error;
			if (isUpstreamFailure(error)) {
				throw new UpstreamUnavailableError(store, error);
			}
			throw error;
		}
	};
}
