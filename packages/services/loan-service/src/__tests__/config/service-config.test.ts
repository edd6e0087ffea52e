import { describe, it, expect } from 'vitest';
import { loadLoanServiceConfig, loanServiceEnvVars } from '../../config/service-config';

describe('loan-service configuration', () => {
  it('requires DATABASE_URL only for the postgres store', () => {
    const required = (env: Record<string, string | undefined>) =>
      loanServiceEnvVars(env)
        .filter(entry => entry.required)
        .map(entry => entry.name);

    expect(required({})).toEqual(['DATABASE_URL']);
    expect(required({ LOAN_STORE: 'memory' })).toEqual([]);
  });

  it('applies defaults for the in-memory store', () => {
    expect(loadLoanServiceConfig({ LOAN_STORE: 'memory' })).toEqual({
      port: 3010,
      store: 'memory',
      corsOrigins: [],
      shutdownTimeoutMs: 30000,
    });
  });

  it('reads explicit values', () => {
    const config = loadLoanServiceConfig({
      DATABASE_URL: 'postgres://localhost:5432/library_test',
      PORT: '4100',
      CORS_ORIGINS: 'http://a.test, http://b.test',
      SHUTDOWN_TIMEOUT_MS: '5000',
    });

    expect(config).toEqual({
      port: 4100,
      store: 'postgres',
      corsOrigins: ['http://a.test', 'http://b.test'],
      shutdownTimeoutMs: 5000,
    });
  });

  it('fails fast when the postgres store has no DATABASE_URL', () => {
    expect(() => loadLoanServiceConfig({})).toThrow(/DATABASE_URL/);
  });

  it('rejects an unknown store kind', () => {
    expect(() => loadLoanServiceConfig({ LOAN_STORE: 'redis', DATABASE_URL: 'postgres://localhost/x' })).toThrow(
      /LOAN_STORE/
    );
  });
});
