import { Router } from 'express';
import type { Orchestrator } from '../coordinator/index.js';
import { errorMessage } from '../services/index.js';
import type { ResetCounterResponse, TriggerRetrainResponse } from './types.js';

/**
 * Administrative controls
 */
export function createAdminRouter(orchestrator: Orchestrator): Router {
  const router = Router();
  const { learningCycle, state } = orchestrator;

  /**
   * POST /trigger_retrain
   *
   * Starts a forced learning cycle in the background.
   * Returns 202 when started, 200 when a cycle is already running.
   */
  router.post('/trigger_retrain', (_req, res) => {
    if (learningCycle.isRunning()) {
      const response: TriggerRetrainResponse = {
        status: 'already_running',
        message: 'A learning cycle is already in progress',
      };
      res.status(200).json(response);
      return;
    }

    // Run in background (don't await)
    learningCycle.runLearningCycle(true).catch((err) => {
      console.error('[Admin] Learning cycle error:', errorMessage(err));
    });

    const response: TriggerRetrainResponse = {
      status: 'triggered',
      message: 'Learning cycle started',
    };
    res.status(202).json(response);
  });

  /**
   * POST /reset_counter
   *
   * Zeroes the likes-since-last-retrain counter. Totals are kept.
   */
  router.post('/reset_counter', (_req, res) => {
    state.resetLikes();
    console.log('[Admin] Like counter reset');
    const response: ResetCounterResponse = { status: 'reset', likesSinceLastRetrain: 0 };
    res.json(response);
  });

  return router;
}
