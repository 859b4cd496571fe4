import { Router } from 'express';
import type { Orchestrator } from '../coordinator/index.js';
import type { CachedScores } from '../state/index.js';
import type { StatusResponse } from './types.js';

/**
 * Introspection routes
 *
 * - GET /status: full orchestrator state plus the learning settings
 * - GET /scores: cached structure scores, without triggering a fetch
 */
export function createStatusRouter(orchestrator: Orchestrator): Router {
  const router = Router();
  const { state, scoreCache, config } = orchestrator;

  router.get('/status', (_req, res) => {
    const response: StatusResponse = {
      ...state.getStatus(),
      likeThreshold: config.learning.likeThreshold,
      explorationRate: config.learning.explorationRate,
      scoreMaxAgeMs: config.learning.scoreMaxAgeMs,
    };
    res.json(response);
  });

  router.get('/scores', (_req, res) => {
    const response: CachedScores = scoreCache.peek(config.learning.scoreMaxAgeMs);
    res.json(response);
  });

  return router;
}
