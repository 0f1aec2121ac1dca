/**
 * UseCase Interface
 *
 * UseCases encapsulate a single business operation. Each use case:
 * - Takes a command (input data)
 * - Performs validation and business rule checks
 * - Reads and writes through repositories it received at construction
 * - Returns a Result: expected outcomes as success or failure, faults thrown
 *
 * @example
 * ```typescript
 * export function createCheckTemplateAccessUseCase(
 *     deps: CheckTemplateAccessUseCaseDeps,
 * ): UseCase<CheckTemplateAccessCommand, AccessVerdict> {
 *     return {
 *         async execute(command) {
 *             const entitlement = await deps.userDirectory.getEntitlement(command.userId);
 *             if (!entitlement) {
 *                 return Result.failure(UseCaseError.notFound('ENTITLEMENT_NOT_FOUND', 'User not found'));
 *             }
 *             ...
 *         },
 *     };
 * }
 * ```
 */

import type { Result } from '@template-sync/domain-core';
import type { Command } from './command.js';

/**
 * @typeParam TCommand - The command type (input data)
 * @typeParam TResult - The value returned on success
 */
export interface UseCase<TCommand extends Command, TResult> {
	execute(command: TCommand): Promise<Result<TResult>>;
}

/**
 * Type for extracting the command type from a UseCase.
 */
export type UseCaseCommand<T> = T extends UseCase<infer TCommand, unknown> ? TCommand : never;

/**
 * Type for extracting the success value type from a UseCase.
 */
export type UseCaseResult<T> = T extends UseCase<Command, infer TResult> ? TResult : never;

/**
 * A use case factory function type, for dependency injection.
 */
export type UseCaseFactory<TCommand extends Command, TResult, TDeps> = (deps: TDeps) => UseCase<TCommand, TResult>;
