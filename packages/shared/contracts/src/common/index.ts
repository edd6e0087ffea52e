/**
 * Common Contracts
 */

export * from './roles.js';
export * from './auth-context.js';
export * from './loan-status.js';
export * from './error-factory.js';
