export * from './account.js';
export * from './workspace.js';
