import 'dotenv/config';
import { createLogger, serializeError, setupGracefulShutdown } from '@biblioteca/platform-core';
import { createApp } from './app';
import { ServiceFactory } from './infrastructure/composition/ServiceFactory';
import { SERVICE_NAME, loadLoanServiceConfig } from './config/service-config';

const logger = createLogger(SERVICE_NAME);

function start(): void {
  const config = loadLoanServiceConfig();

  logger.info(`Starting ${SERVICE_NAME}...`, { store: config.store, nodeEnv: process.env.NODE_ENV });

  const app = createApp({
    factory: ServiceFactory.forStore(config.store),
    corsOrigins: config.corsOrigins,
  });

  const server = app.listen(config.port, () => {
    logger.info(`${SERVICE_NAME} listening`, { port: config.port });
  });

  setupGracefulShutdown(server, config.shutdownTimeoutMs);
}

try {
  start();
} catch (error) {
  logger.error(`Failed to start ${SERVICE_NAME}`, { error: serializeError(error) });
  process.exit(1);
}
