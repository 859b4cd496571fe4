/**
 * Strategist Client
 *
 * Asks the strategist to invent new prompt structures, biased by the current
 * structure scores.
 */

import { z } from 'zod';
import type { RetryConfig, TimeoutConfig } from '../config/index.js';
import { ServiceClient } from './http.js';
import type { IdeaRequest, IdeaResult, StrategistService } from './types.js';

const batchRunResponseSchema = z.object({
  totalGenerated: z.number().int().min(0).default(0),
});

export class StrategistClient implements StrategistService {
  private readonly http: ServiceClient;

  constructor(baseUrl: string, timeouts: TimeoutConfig, retry: RetryConfig) {
    this.http = new ServiceClient('Strategist', baseUrl, {
      timeoutMs: timeouts.strategistMs,
      maxAttempts: retry.maxAttempts,
      retryBaseDelay: retry.baseDelayMs,
    });
  }

  async warmUp(): Promise<boolean> {
    return this.http.ping('/api/health');
  }

  async generateIdeas(request: IdeaRequest): Promise<IdeaResult> {
    const response = await this.http.request('/api/batch/run', batchRunResponseSchema, {
      method: 'POST',
      body: {
        num_ideas: request.numIdeas,
        exploration_rate: request.explorationRate,
        structure_scores: request.scores,
      },
    });

    return { totalGenerated: response.totalGenerated };
  }
}
