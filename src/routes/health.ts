/**
 * Health and stats routes.
 *
 * - GET /api/health: liveness plus index, queue and profile cache status
 * - GET /api/v1/stats: the same counters without the liveness envelope
 *
 * Neither calls the model or the embedding provider.
 */
import { Router } from "express";

import type { Engine } from "@app/engine";

export function createHealthRouter(engine: Engine): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    const stats = engine.stats();
    res.json({
      status: "ok",
      index: stats.index.state,
      indexSize: stats.index.size,
      queuePending: stats.queue.pending,
      profileCacheSize: stats.profileCache.size,
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}

export function createStatsRouter(engine: Engine): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json(engine.stats());
  });

  return router;
}
