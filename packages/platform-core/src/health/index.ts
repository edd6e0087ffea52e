export * from './types.js';
export * from './health-router.js';
