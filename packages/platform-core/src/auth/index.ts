export * from './policy-guards.js';
