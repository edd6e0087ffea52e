import { describe, it, expect, vi } from 'vitest';

vi.mock('../logging/logger.js', () => {
  const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  return { createLogger: () => logger, getLogger: () => logger };
});

import {
  failFastValidation,
  parseList,
  parsePositiveInt,
  validateEnvironmentConfig,
  type EnvVarConfig,
} from '../config/environment-config.js';
import { DomainError } from '../error-handling/errors.js';

const configs: EnvVarConfig[] = [
  { name: 'DATABASE_URL', required: true, description: 'PostgreSQL connection string', sensitive: true },
  { name: 'LOAN_STORE', required: false, description: 'Store backend', allowed: ['postgres', 'memory'] },
];

describe('environment-config', () => {
  it('reports missing required and unset optional variables', () => {
    const result = validateEnvironmentConfig(configs, {});

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['Missing required: DATABASE_URL - PostgreSQL connection string']);
    expect(result.warnings).toEqual(['Optional not set: LOAN_STORE - Store backend']);
  });

  it('rejects values outside the allowed set', () => {
    const result = validateEnvironmentConfig(configs, { DATABASE_URL: 'postgres://localhost/test', LOAN_STORE: 'redis' });

    expect(result.errors).toEqual(['Invalid value for LOAN_STORE: "redis" (expected one of postgres, memory)']);
  });

  it('throws from failFastValidation when validation fails', () => {
    expect(() => failFastValidation('loan-service', configs, {})).toThrow(DomainError);
    expect(() => failFastValidation('loan-service', configs, { DATABASE_URL: 'postgres://localhost/test' })).not.toThrow();
  });

  it('parses positive integers with defaults', () => {
    expect(parsePositiveInt('PORT', 3010, 1, {})).toBe(3010);
    expect(parsePositiveInt('PORT', 3010, 1, { PORT: '8080' })).toBe(8080);
    expect(() => parsePositiveInt('PORT', 3010, 1, { PORT: 'zero' })).toThrow('Invalid PORT');
  });

  it('splits comma separated lists', () => {
    expect(parseList('CORS_ORIGINS', { CORS_ORIGINS: 'http://a.test, http://b.test,' })).toEqual([
      'http://a.test',
      'http://b.test',
    ]);
    expect(parseList('CORS_ORIGINS', {})).toEqual([]);
  });
});
