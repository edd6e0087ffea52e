import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createHealthRouter, errorHandler, notFoundHandler, requestCorrelation } from '@biblioteca/platform-core';
import { createRoutes } from './presentation/routes';
import type { ServiceFactory } from './infrastructure/composition/ServiceFactory';
import { SERVICE_NAME } from './config/service-config';

export interface AppOptions {
  factory: ServiceFactory;
  /** Empty list allows any origin */
  corsOrigins?: string[];
}

export function createApp({ factory, corsOrigins = [] }: AppOptions): Express {
  const app = express();
  const store = factory.getStore();

  app.disable('x-powered-by');
  app.use(helmet());
  app.use(cors({ origin: corsOrigins.length > 0 ? corsOrigins : '*' }));
  app.use(express.json({ limit: '100kb' }));
  app.use(requestCorrelation(SERVICE_NAME));

  app.use(
    createHealthRouter({
      serviceName: SERVICE_NAME,
      checks: { database: () => store.healthCheck() },
    })
  );

  app.use('/api', createRoutes(factory));

  app.use(notFoundHandler());
  app.use(errorHandler());

  return app;
}
