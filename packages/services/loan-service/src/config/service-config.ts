/**
 * Loan service configuration
 *
 * Environment variables are declared once here and validated at start-up.
 */

import {
  getLogger as getPlatformLogger,
  failFastValidation,
  parseList,
  parsePositiveInt,
  type EnvVarConfig,
  type Logger,
} from '@biblioteca/platform-core';

export const SERVICE_NAME = 'loan-service';

export const LOAN_STORE_KINDS = ['postgres', 'memory'] as const;
export type LoanStoreKind = (typeof LOAN_STORE_KINDS)[number];

export function getLogger(moduleName: string): Logger {
  return getPlatformLogger(`${SERVICE_NAME}:${moduleName}`);
}

export function loanServiceEnvVars(env: Record<string, string | undefined> = process.env): EnvVarConfig[] {
  const store = env.LOAN_STORE || 'postgres';
  return [
    {
      name: 'DATABASE_URL',
      required: store === 'postgres',
      description: 'PostgreSQL connection string for the library database',
      sensitive: true,
    },
    { name: 'LOAN_STORE', required: false, description: 'Loan store backend (default: postgres)', allowed: LOAN_STORE_KINDS },
    { name: 'PORT', required: false, description: 'HTTP port (default: 3010)' },
    { name: 'DATABASE_POOL_MAX', required: false, description: 'Max pooled database connections' },
    { name: 'STATEMENT_TIMEOUT_MS', required: false, description: 'PostgreSQL statement timeout in ms' },
    { name: 'SHUTDOWN_TIMEOUT_MS', required: false, description: 'Graceful shutdown timeout in ms' },
    { name: 'LOG_LEVEL', required: false, description: 'Winston log level' },
    { name: 'CORS_ORIGINS', required: false, description: 'Comma-separated list of allowed CORS origins' },
  ];
}

export interface LoanServiceConfig {
  port: number;
  store: LoanStoreKind;
  corsOrigins: string[];
  shutdownTimeoutMs: number;
}

function isLoanStoreKind(value: string): value is LoanStoreKind {
  return LOAN_STORE_KINDS.some(kind => kind === value);
}

export function loadLoanServiceConfig(env: Record<string, string | undefined> = process.env): LoanServiceConfig {
  failFastValidation(SERVICE_NAME, loanServiceEnvVars(env), env);

  const store = env.LOAN_STORE || 'postgres';
  return {
    port: parsePositiveInt('PORT', 3010, 1, env),
    store: isLoanStoreKind(store) ? store : 'postgres',
    corsOrigins: parseList('CORS_ORIGINS', env),
    shutdownTimeoutMs: parsePositiveInt('SHUTDOWN_TIMEOUT_MS', 30000, 1, env),
  };
}
