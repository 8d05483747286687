/**
 * @file src/routes/health.ts
 * @description Health check endpoint
 * @context Используется для мониторинга состояния сервиса
 */

import { Router, Request, Response } from 'express';
import config from '../config';
import { SpecialistRegistry } from '../services/specialists/registry';

export function createHealthRouter(registry: SpecialistRegistry): Router {
  const router = Router();

  router.get('/', (req: Request, res: Response) => {
    res.json({
      status: 'ok',
      service: {
        id: config.service.id,
        name: config.service.name,
        version: config.service.version,
      },
      specialists: registry.ids(),
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  return router;
}

export default createHealthRouter;
