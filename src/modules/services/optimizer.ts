/**
 * Optimizer Client
 *
 * Trains the preference model on the latest feedback and scores prompt
 * structures.
 */

import { z } from 'zod';
import type { RetryConfig, TimeoutConfig } from '../config/index.js';
import { ServiceClient } from './http.js';
import type { OptimizerService, ScoreResponse, StructureInsights, StructureScore } from './types.js';

const trainResponseSchema = z.record(z.unknown());

const scoreResponseSchema = z.object({
  structures: z
    .array(
      z.object({
        structure_id: z.union([z.string(), z.number()]).nullish(),
        predicted_success_score: z.number().nullish(),
      })
    )
    .default([]),
  global_preference_vector: z.record(z.unknown()).default({}),
});

const insightsResponseSchema = z.object({
  status: z.string().default('ok'),
  insights: z.record(z.unknown()).default({}),
});

export class OptimizerClient implements OptimizerService {
  private readonly http: ServiceClient;
  private readonly timeouts: TimeoutConfig;

  constructor(baseUrl: string, timeouts: TimeoutConfig, retry: RetryConfig) {
    this.timeouts = timeouts;
    this.http = new ServiceClient('Optimizer', baseUrl, {
      timeoutMs: timeouts.scoreMs,
      maxAttempts: retry.maxAttempts,
      retryBaseDelay: retry.baseDelayMs,
    });
  }

  /**
   * Train on the latest feedback. Not retried automatically: the optimizer
   * gives no guarantee that a repeated train request is harmless.
   */
  async train(): Promise<Record<string, unknown>> {
    return this.http.request('/train', trainResponseSchema, {
      method: 'POST',
      body: {},
      timeoutMs: this.timeouts.trainMs,
      retry: false,
    });
  }

  async scoreStructures(): Promise<ScoreResponse> {
    const response = await this.http.request('/score_structures', scoreResponseSchema, {
      method: 'POST',
      body: {},
      timeoutMs: this.timeouts.scoreMs,
    });

    const structures: StructureScore[] = [];
    for (const structure of response.structures) {
      // Entries without an id or a score cannot be cached or persisted
      if (structure.structure_id == null || structure.predicted_success_score == null) continue;
      const score = structure.predicted_success_score;
      if (score < 0 || score > 1) {
        console.warn(`[Optimizer] Skipping structure ${structure.structure_id}: score ${score} outside [0, 1]`);
        continue;
      }
      structures.push({
        structureId: String(structure.structure_id),
        predictedSuccessScore: score,
      });
    }

    return {
      structures,
      globalPreferenceVector: response.global_preference_vector,
    };
  }

  async getStructureInsights(structureIds: string[]): Promise<StructureInsights> {
    return this.http.request('/structure_prompt_insights', insightsResponseSchema, {
      query: structureIds.length > 0 ? { structure_ids: structureIds.join(',') } : undefined,
      timeoutMs: this.timeouts.scoreMs,
    });
  }
}
