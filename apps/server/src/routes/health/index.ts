/**
 * Health route - GET /api/health
 */

import { Router } from 'express';

export function createHealthRoutes(startedAt: Date = new Date()): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      success: true,
      status: 'ok',
      uptime_seconds: Math.floor((Date.now() - startedAt.getTime()) / 1000),
    });
  });

  return router;
}
