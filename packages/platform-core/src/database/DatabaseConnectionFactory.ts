/**
 * Database Connection Factory
 *
 * Lazily creates one pg Pool and Drizzle instance per service and closes them
 * in the `connections` shutdown phase.
 *
 * @example
 * import { createDatabaseConnectionFactory } from '@biblioteca/platform-core';
 * import * as schema from './schemas/library-schema';
 *
 * const { getDatabase } = createDatabaseConnectionFactory({
 *   serviceName: 'loan-service',
 *   schema,
 * });
 */

import { Pool } from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { createLogger } from '../logging/logger.js';
import { serializeError } from '../logging/error-serializer.js';
import { registerPhasedShutdownHook } from '../lifecycle/gracefulShutdown.js';
import { parsePositiveInt } from '../config/environment-config.js';
import { DomainError } from '../error-handling/errors.js';

type SQLConnection = Pool;

export interface DatabaseConfig<TSchema extends Record<string, unknown>> {
  serviceName: string;
  envVarName?: string;
  schema: TSchema;
}

export interface DatabaseConnectionFactoryInstance<TSchema extends Record<string, unknown>> {
  getDatabase: () => NodePgDatabase<TSchema>;
  close: () => Promise<void>;
}

const DEFAULT_STATEMENT_TIMEOUT_MS = 30000;

class DatabaseConnectionFactoryClass<TSchema extends Record<string, unknown>> {
  private sqlConnection: SQLConnection | null = null;
  private dbConnection: NodePgDatabase<TSchema> | null = null;
  private isClosed = false;
  private readonly envVarName: string;
  private readonly logger;

  constructor(private readonly config: DatabaseConfig<TSchema>) {
    this.envVarName = config.envVarName || 'DATABASE_URL';
    this.logger = createLogger(`${config.serviceName}-database`);
  }

  private getConnectionString(): string {
    const connectionString = process.env[this.envVarName];

    if (!connectionString) {
      this.logger.error('Database URL not configured', {
        serviceName: this.config.serviceName,
        requiredEnvVar: this.envVarName,
      });
      throw new DomainError(`${this.envVarName} environment variable is required for ${this.config.serviceName}`, 500);
    }

    return this.appendConnectionParams(connectionString);
  }

  private getSslConfig(connStr: string): false | { rejectUnauthorized: boolean } {
    if (process.env.DATABASE_SSL === 'false') {
      return false;
    }
    try {
      const url = new URL(connStr);
      if (url.hostname === 'localhost' || url.hostname === '127.0.0.1') {
        return false;
      }
      if (url.searchParams.get('sslmode') === 'disable') {
        return false;
      }
    } catch (error) {
      this.logger.warn('Could not parse database URL for SSL detection', { error: serializeError(error) });
    }
    return { rejectUnauthorized: false };
  }

  private appendConnectionParams(connStr: string): string {
    const statementTimeout = parsePositiveInt('STATEMENT_TIMEOUT_MS', DEFAULT_STATEMENT_TIMEOUT_MS);
    if (connStr.includes('statement_timeout=')) {
      return connStr;
    }
    return connStr.includes('?')
      ? `${connStr}&statement_timeout=${statementTimeout}`
      : `${connStr}?statement_timeout=${statementTimeout}`;
  }

  private getSQLConnection(): SQLConnection {
    if (this.isClosed) {
      throw new DomainError(`Database connections for ${this.config.serviceName} are closed`, 503);
    }
    if (!this.sqlConnection) {
      try {
        const connStr = this.getConnectionString();
        this.sqlConnection = new Pool({
          connectionString: connStr,
          max: parsePositiveInt('DATABASE_POOL_MAX', process.env.NODE_ENV === 'production' ? 20 : 5),
          idleTimeoutMillis: 30000,
          connectionTimeoutMillis: 10000,
          ssl: this.getSslConfig(connStr),
        });
        this.sqlConnection.on('error', error => {
          this.logger.error('Idle database client error', { error: serializeError(error) });
        });
        this.logger.debug('SQL connection pool established', { serviceName: this.config.serviceName });
      } catch (error) {
        this.logger.error('SQL connection failed', {
          serviceName: this.config.serviceName,
          error: serializeError(error),
        });
        throw error;
      }
    }
    return this.sqlConnection;
  }

  public getDatabase(): NodePgDatabase<TSchema> {
    if (!this.dbConnection) {
      this.dbConnection = drizzle(this.getSQLConnection(), { schema: this.config.schema });
      this.logger.debug('Drizzle database connection established');
    }
    return this.dbConnection;
  }

  public async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;
    this.logger.info('Closing database connections', { serviceName: this.config.serviceName });
    if (this.sqlConnection) await this.sqlConnection.end();
    this.sqlConnection = null;
    this.dbConnection = null;
    this.logger.info('Database connection pool closed', { serviceName: this.config.serviceName });
  }
}

export function createDatabaseConnectionFactory<TSchema extends Record<string, unknown>>(
  config: DatabaseConfig<TSchema>
): DatabaseConnectionFactoryInstance<TSchema> {
  const instance = new DatabaseConnectionFactoryClass(config);

  registerPhasedShutdownHook('connections', () => instance.close(), `database:${config.serviceName}`);

  return {
    getDatabase: () => instance.getDatabase(),
    close: () => instance.close(),
  };
}
