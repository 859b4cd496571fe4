import { z } from 'zod';
import type { Request, Response, NextFunction } from 'express';
import type { StateSnapshot } from '../state/index.js';

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

/**
 * Request body for a like event
 */
export const likeBodySchema = z.object({
  recordId: z.string().min(1).optional(),
  structureId: z.string().min(1).optional(),
  imageUrl: z.string().min(1).optional(),
});

/**
 * Request body for the daily batch
 */
export const dailyBatchBodySchema = z.object({
  forceRetrain: z.boolean().optional(),
  numIdeas: z.number().int().positive().optional(),
  numPrompts: z.number().int().positive().optional(),
  renderer: z.string().min(1).optional(),
});

/**
 * Request body for manual prompt generation
 */
export const manualGenerateBodySchema = z.object({
  numPrompts: z.number().int().positive().optional(),
  renderer: z.string().min(1).optional(),
  forceRetrain: z.boolean().optional(),
});

/**
 * Parse a request body, turning validation issues into a 400
 */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const parseResult = schema.safeParse(body ?? {});
  if (!parseResult.success) {
    const errorMessages = parseResult.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new BadRequestError(errorMessages.join('; '));
  }
  return parseResult.data;
}

// =============================================================================
// API RESPONSE TYPES
// =============================================================================

/**
 * Response for GET /
 */
export interface RootResponse {
  service: string;
  version: string;
  status: 'running';
}

/**
 * Response for GET /health
 */
export interface HealthResponse {
  status: 'healthy';
  likesSinceLastRetrain: number;
  totalRetrains: number;
  isRetraining: boolean;
  timestamp: string;
}

/**
 * Response for GET /status
 */
export interface StatusResponse extends StateSnapshot {
  likeThreshold: number;
  explorationRate: number;
  scoreMaxAgeMs: number;
}

/**
 * Response for POST /trigger_retrain
 */
export interface TriggerRetrainResponse {
  status: 'triggered' | 'already_running';
  message: string;
}

/**
 * Response for POST /reset_counter
 */
export interface ResetCounterResponse {
  status: 'reset';
  likesSinceLastRetrain: 0;
}

/**
 * Standard error response
 */
export interface ErrorResponse {
  error: string;
  message: string;
}

// =============================================================================
// ERROR CLASSES
// =============================================================================

/**
 * Base API error class
 */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly error: string;

  constructor(statusCode: number, error: string, message: string) {
    super(message);
    this.statusCode = statusCode;
    this.error = error;
    this.name = 'ApiError';
  }

  toJSON(): ErrorResponse {
    return {
      error: this.error,
      message: this.message,
    };
  }
}

/**
 * 400 Bad Request error
 */
export class BadRequestError extends ApiError {
  constructor(message: string) {
    super(400, 'Bad Request', message);
    this.name = 'BadRequestError';
  }
}

// =============================================================================
// TYPED REQUEST HANDLERS
// =============================================================================

/**
 * Typed async request handler with error handling
 */
export type AsyncRequestHandler<
  Params = Record<string, string>,
  ResBody = unknown,
  ReqBody = unknown,
  Query = Record<string, unknown>
> = (
  req: Request<Params, ResBody, ReqBody, Query>,
  res: Response<ResBody>,
  next: NextFunction
) => Promise<void>;

/**
 * Wraps an async handler to catch errors and pass them to the error middleware
 */
export function asyncHandler<
  Params = Record<string, string>,
  ResBody = unknown,
  ReqBody = unknown,
  Query = Record<string, unknown>
>(
  fn: AsyncRequestHandler<Params, ResBody, ReqBody, Query>
): (req: Request<Params, ResBody, ReqBody, Query>, res: Response<ResBody>, next: NextFunction) => void {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
