/**
 * Health endpoints
 * - /health       - Liveness probe (is the process running?)
 * - /health/ready - Readiness probe (are the dependencies reachable?)
 */

import { Router, type Request, type Response } from 'express';
import { getLogger } from '../logging/logger.js';
import { errorMessage } from '../error-handling/errors.js';
import type { ComponentHealth, HealthRouterConfig, LivenessResponse, ReadinessResponse } from './types.js';

const logger = getLogger('health');

async function runCheck(check: () => Promise<void>): Promise<ComponentHealth> {
  const startedAt = Date.now();
  try {
    await check();
    return { status: 'healthy', responseTimeMs: Date.now() - startedAt };
  } catch (error) {
    return { status: 'unhealthy', responseTimeMs: Date.now() - startedAt, errorMessage: errorMessage(error) };
  }
}

export function createHealthRouter(config: HealthRouterConfig): Router {
  const router = Router();
  const startupTime = Date.now();
  const uptime = () => Math.floor((Date.now() - startupTime) / 1000);

  router.get('/health', (_req: Request, res: Response) => {
    const body: LivenessResponse = {
      alive: true,
      service: config.serviceName,
      timestamp: new Date().toISOString(),
      uptime: uptime(),
    };
    res.status(200).json(body);
  });

  router.get('/health/ready', async (_req: Request, res: Response) => {
    const components: Record<string, ComponentHealth> = {};
    for (const [name, check] of Object.entries(config.checks ?? {})) {
      components[name] = await runCheck(check);
    }
    const ready = Object.values(components).every(component => component.status === 'healthy');
    if (!ready) {
      logger.warn('Readiness check failed', { service: config.serviceName, components });
    }

    const body: ReadinessResponse = {
      ready,
      service: config.serviceName,
      timestamp: new Date().toISOString(),
      uptime: uptime(),
      components,
    };
    res.status(ready ? 200 : 503).json(body);
  });

  return router;
}
