export * from './loan-schemas.js';
