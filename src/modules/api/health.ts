import { Router } from 'express';
import type { Orchestrator } from '../coordinator/index.js';
import type { HealthResponse } from './types.js';

/**
 * GET /health
 *
 * Liveness check for load balancers. Collaborators are not probed; the
 * process is healthy while it can answer.
 */
export function createHealthRouter(orchestrator: Orchestrator): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const { state } = orchestrator;
    const response: HealthResponse = {
      status: 'healthy',
      likesSinceLastRetrain: state.likesSinceLastRetrain,
      totalRetrains: state.totalRetrains,
      isRetraining: state.isRetraining,
      timestamp: state.now().toISOString(),
    };
    res.json(response);
  });

  return router;
}
