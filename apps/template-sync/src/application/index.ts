/**
 * Application Layer
 *
 * Use cases and the services they share.
 */

export * from './template-sync/index.js';
export { createUserDirectory, type UserDirectory, type UserDirectoryDeps } from './user-directory.js';
