/**
 * Persistence Infrastructure
 */

export * from './schema/index.js';
export * from './repositories/index.js';
