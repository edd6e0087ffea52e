/**
 * Platform Core - Shared Utilities for Library Services
 *
 * - Structured logging with correlation tracking
 * - Error handling patterns and response envelopes
 * - Gateway identity guards and request validation
 * - Database connection management and graceful shutdown
 */

export * from './auth/index.js';
export * from './config/index.js';
export * from './database/index.js';
export * from './error-handling/index.js';
export * from './health/index.js';
export * from './http/index.js';
export * from './lifecycle/index.js';
export * from './logging/index.js';
export * from './middleware/index.js';
export * from './resilience/index.js';
