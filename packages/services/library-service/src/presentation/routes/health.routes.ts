import { Router } from 'express';
import { asyncHandler } from '@shelfwise/platform-core';
import { SERVICE_NAME } from '@config/service-config';
import type { Repositories } from '@infrastructure/composition/repositories';

export function createHealthRoutes(repositories: Repositories): Router {
  const router = Router();
  const startTime = Date.now();
  const uptime = () => Math.floor((Date.now() - startTime) / 1000);

  router.get('/health', (_req, res) => {
    res.status(200).json({
      service: SERVICE_NAME,
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: uptime(),
    });
  });

  router.get('/health/live', (_req, res) => {
    res.status(200).json({ alive: true, service: SERVICE_NAME, uptime: uptime() });
  });

  // ready once the store answers
  router.get(
    '/health/ready',
    asyncHandler(async (_req, res) => {
      const store = await repositories.healthCheck();
      const ready = store.status === 'healthy';
      res.status(ready ? 200 : 503).json({
        ready,
        service: SERVICE_NAME,
        timestamp: new Date().toISOString(),
        components: { store },
      });
    })
  );

  return router;
}
