/**
 * Shared contracts for the biblioteca platform
 *
 * Cross-service types, constants and request schemas.
 * Services import from @biblioteca/shared-contracts instead of defining local duplicates.
 */

export * from './common/index.js';

export * from './api/index.js';
