/**
 * Database connection for loan-service
 * Uses the platform-core factory (node-postgres pool + Drizzle).
 */

import { createDatabaseConnectionFactory, type DatabaseConnectionFactoryInstance } from '@biblioteca/platform-core';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import * as librarySchema from './schemas/library-schema';
import { SERVICE_NAME } from '../../config/service-config';

const schema = { ...librarySchema };

export type DatabaseSchema = typeof schema;
export type DatabaseConnection = NodePgDatabase<DatabaseSchema>;
export type DatabaseTransaction = Parameters<Parameters<DatabaseConnection['transaction']>[0]>[0];

let factory: DatabaseConnectionFactoryInstance<DatabaseSchema> | null = null;

function getFactory(): DatabaseConnectionFactoryInstance<DatabaseSchema> {
  if (!factory) {
    factory = createDatabaseConnectionFactory({ serviceName: SERVICE_NAME, schema });
  }
  return factory;
}

export function getDatabase(): DatabaseConnection {
  return getFactory().getDatabase();
}
