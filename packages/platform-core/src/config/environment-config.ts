/**
 * Environment Configuration Utilities
 *
 * Start-up validation of environment variables and typed accessors.
 * Each service declares its variables as EnvVarConfig entries and calls
 * failFastValidation() before it opens connections.
 */

import { getLogger } from '../logging/logger.js';
import { DomainError } from '../error-handling/errors.js';

const logger = getLogger('environment-config');

export interface EnvVarConfig {
  name: string;
  required: boolean;
  description: string;
  sensitive?: boolean;
  /** Values the variable may take when set */
  allowed?: readonly string[];
}

type Env = Record<string, string | undefined>;

export interface EnvValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export function validateEnvironmentConfig(configs: EnvVarConfig[], env: Env = process.env): EnvValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const config of configs) {
    const value = env[config.name];

    if (config.required && !value) {
      errors.push(`Missing required: ${config.name} - ${config.description}`);
    } else if (!value) {
      warnings.push(`Optional not set: ${config.name} - ${config.description}`);
    } else if (config.allowed && !config.allowed.includes(value)) {
      const shown = config.sensitive ? '[REDACTED]' : value;
      errors.push(`Invalid value for ${config.name}: "${shown}" (expected one of ${config.allowed.join(', ')})`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Fail fast validation - call at service startup.
 * Throws on missing required or invalid vars; optional ones are only logged.
 */
export function failFastValidation(serviceName: string, configs: EnvVarConfig[], env: Env = process.env): void {
  const result = validateEnvironmentConfig(configs, env);

  if (result.warnings.length > 0) {
    logger.debug('Optional env vars not configured', { serviceName, count: result.warnings.length });
  }

  if (!result.valid) {
    throw new DomainError(
      `Environment validation failed for ${serviceName}:\n${result.errors.map(e => `  - ${e}`).join('\n')}`,
      500
    );
  }

  logger.info('Environment validation passed', { serviceName });
}

export function parsePositiveInt(envVar: string, defaultValue: number, minValue = 1, env: Env = process.env): number {
  const value = env[envVar];
  if (!value) return defaultValue;

  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < minValue) {
    throw new DomainError(
      `Invalid ${envVar}: "${value}". Must be an integer >= ${minValue}. Default is ${defaultValue}.`,
      500
    );
  }
  return parsed;
}

export function parseList(envVar: string, env: Env = process.env): string[] {
  const value = env[envVar];
  if (!value) return [];
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}
