export * from './response-helpers.js';
export * from './controller-helpers.js';
