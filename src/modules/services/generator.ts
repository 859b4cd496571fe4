/**
 * Generator Client
 *
 * Receives updated preferences after each learning cycle and produces image
 * prompts on demand. Large prompt requests are split into several calls so a
 * single request never runs into the generator's own timeout.
 */

import { z } from 'zod';
import type { GenerationConfig, RetryConfig, TimeoutConfig } from '../config/index.js';
import { ServiceClient, sleep } from './http.js';
import type { GeneratedPrompt, GeneratorService, PreferenceUpdate } from './types.js';

const updateResponseSchema = z.record(z.unknown());

const promptSchema = z.union([
  z.string().transform((promptText): GeneratedPrompt => ({ promptText })),
  z.object({
    promptText: z.string().default(''),
    renderer: z.string().optional(),
    designerId: z.string().optional(),
    garmentId: z.string().optional(),
    promptStructureId: z.string().optional(),
  }),
]);

const generateResponseSchema = z.object({
  prompts: z.array(promptSchema).default([]),
});

export class GeneratorClient implements GeneratorService {
  private readonly http: ServiceClient;
  private readonly timeouts: TimeoutConfig;
  private readonly batchSize: number;
  private readonly batchDelayMs: number;

  constructor(
    baseUrl: string,
    timeouts: TimeoutConfig,
    retry: RetryConfig,
    generation: Pick<GenerationConfig, 'generatorBatchSize' | 'generatorBatchDelayMs'>
  ) {
    this.timeouts = timeouts;
    this.batchSize = generation.generatorBatchSize;
    this.batchDelayMs = generation.generatorBatchDelayMs;
    this.http = new ServiceClient('Generator', baseUrl, {
      timeoutMs: timeouts.generatorMs,
      maxAttempts: retry.maxAttempts,
      retryBaseDelay: retry.baseDelayMs,
    });
  }

  async warmUp(): Promise<boolean> {
    return this.http.ping('/health');
  }

  async updatePreferences(update: PreferenceUpdate): Promise<Record<string, unknown>> {
    return this.http.request('/update_preferences', updateResponseSchema, {
      method: 'POST',
      body: {
        global_preference_vector: update.globalPreferenceVector,
        exploration_rate: update.explorationRate,
        structure_scores: update.structureScores,
        structure_prompt_insights: update.structurePromptInsights,
      },
      timeoutMs: this.timeouts.updateMs,
    });
  }

  async generatePrompts(numPrompts: number, renderer: string): Promise<GeneratedPrompt[]> {
    const allPrompts: GeneratedPrompt[] = [];
    let remaining = numPrompts;
    let batchNum = 0;

    while (remaining > 0) {
      batchNum++;
      const currentBatch = Math.min(remaining, this.batchSize);
      console.log(`[Generator] Batch ${batchNum}: requesting ${currentBatch} prompts`);

      const result = await this.http.request('/generate-prompts', generateResponseSchema, {
        method: 'POST',
        body: { num_prompts: currentBatch, renderer },
        timeoutMs: this.timeouts.generatorMs,
      });

      allPrompts.push(...result.prompts);
      console.log(`[Generator] Batch ${batchNum}: received ${result.prompts.length} prompts`);

      remaining -= currentBatch;

      // Give the generator's upstream rate limits room between batches
      if (remaining > 0 && this.batchDelayMs > 0) {
        await sleep(this.batchDelayMs);
      }
    }

    console.log(`[Generator] Complete: ${allPrompts.length} prompts from ${batchNum} batch(es)`);
    return allPrompts;
  }
}
