/**
 * API Module
 *
 * JSON endpoints for the orchestrator.
 *
 * Events:
 * - POST /events/like (legacy: POST /like_event) - Record a like
 * - POST /events/daily_batch - Run the daily batch
 * - POST /events/manual_generate - Generate prompts on demand
 *
 * Introspection:
 * - GET / - Service banner
 * - GET /health - Liveness and counters
 * - GET /status - Full orchestrator state
 * - GET /scores - Cached structure scores
 *
 * Admin:
 * - POST /trigger_retrain - Force a learning cycle
 * - POST /reset_counter - Reset the like counter
 */

import express from 'express';
import cors from 'cors';
import type { Orchestrator } from '../coordinator/index.js';
import { createEventsRouter, createLikeHandler } from './events.js';
import { createHealthRouter } from './health.js';
import { createStatusRouter } from './status.js';
import { createAdminRouter } from './admin.js';
import { errorHandler, notFoundHandler, requestLogger } from './middleware.js';
import type { RootResponse } from './types.js';

export const SERVICE_NAME = 'feedback-orchestrator';
export const SERVICE_VERSION = '1.0.0';

// Export types
export * from './types.js';

// Export middleware
export { errorHandler, notFoundHandler, requestLogger } from './middleware.js';

/**
 * Creates and configures the Express application with all middleware.
 *
 * @param orchestrator - Coordinators and state the routes act on
 * @param options - Configuration options
 * @returns Configured Express application
 */
export function createApp(
  orchestrator: Orchestrator,
  options: { enableCors?: boolean; enableLogging?: boolean } = {}
): express.Application {
  const { enableCors = true, enableLogging = true } = options;

  const app = express();

  // Parse JSON request bodies
  app.use(express.json());

  // Enable CORS if requested
  if (enableCors) {
    app.use(cors());
  }

  // Request logging
  if (enableLogging) {
    app.use(requestLogger);
  }

  app.get('/', (_req, res) => {
    const response: RootResponse = {
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      status: 'running',
    };
    res.json(response);
  });

  app.use('/events', createEventsRouter(orchestrator));
  app.post('/like_event', createLikeHandler(orchestrator));

  app.use('/health', createHealthRouter(orchestrator));
  app.use('/', createStatusRouter(orchestrator));
  app.use('/', createAdminRouter(orchestrator));

  // 404 handler for unmatched routes
  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}

export default createApp;
