/**
 * @template-sync/application
 *
 * Application layer contracts: commands as use case inputs and the UseCase
 * interface every operation implements. Result and UseCaseError are
 * re-exported so use cases import from one place.
 */

export { type Command, commandName } from './command.js';
export { type UseCase, type UseCaseCommand, type UseCaseResult, type UseCaseFactory } from './use-case.js';

export { Result, UseCaseError, isSuccess, isFailure } from '@template-sync/domain-core';
