import { Router, type RequestHandler } from 'express';
import type { Orchestrator } from '../coordinator/index.js';
import {
  asyncHandler,
  dailyBatchBodySchema,
  likeBodySchema,
  manualGenerateBodySchema,
  parseBody,
} from './types.js';

/**
 * Like handler, mounted under /events and on the legacy path
 */
export function createLikeHandler(orchestrator: Orchestrator): RequestHandler {
  return asyncHandler(async (req, res) => {
    const event = parseBody(likeBodySchema, req.body);
    const { learningCycle: _cycle, ...result } = await orchestrator.workflows.recordLike(event, { awaitCycle: false });
    res.json(result);
  });
}

/**
 * Event routes
 *
 * - POST /events/like (and legacy POST /like_event): count a like; a
 *   threshold-triggered learning cycle runs after the response
 * - POST /events/daily_batch: run the daily batch and wait for it
 * - POST /events/manual_generate: generate prompts on demand
 */
export function createEventsRouter(orchestrator: Orchestrator): Router {
  const router = Router();
  const { workflows } = orchestrator;

  router.post('/like', createLikeHandler(orchestrator));

  router.post(
    '/daily_batch',
    asyncHandler(async (req, res) => {
      const request = parseBody(dailyBatchBodySchema, req.body);
      const result = await workflows.runDailyBatch(request);
      res.json(result);
    })
  );

  router.post(
    '/manual_generate',
    asyncHandler(async (req, res) => {
      const request = parseBody(manualGenerateBodySchema, req.body);
      const result = await workflows.runManualGenerate(request);
      res.json(result);
    })
  );

  return router;
}
