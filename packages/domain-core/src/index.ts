/**
 * @template-sync/domain-core
 *
 * Core types shared by every layer of the service:
 * - Result type for use case outcomes
 * - Use case error types with HTTP status mapping
 *
 * @example
 * ```typescript
 * import { Result, UseCaseError } from '@template-sync/domain-core';
 *
 * if (!entitlement) {
 *     return Result.failure(UseCaseError.notFound('ENTITLEMENT_NOT_FOUND', 'User not found'));
 * }
 * return Result.success(snapshot);
 * ```
 */

// Error types
export { UseCaseError, type UseCaseErrorBase, type NotFoundError } from './errors.js';

// Result type
export { Result, isSuccess, isFailure, type Success, type Failure } from './result.js';
