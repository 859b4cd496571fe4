/**
 * Batch Workflow Coordinator
 *
 * Generation workflows and like events. Each workflow may run the learning
 * cycle first, then calls the generation services:
 * - Daily batch: structure ideas from the strategist, then prompts from the
 *   generator, then prompt write-back
 * - Manual generate: prompts and write-back only
 * - Like: count the like and trigger the cycle at the threshold
 */

import type { GenerationConfig, LearningConfig } from '../config/index.js';
import {
  errorMessage,
  type BatchSettings,
  type Collaborators,
  type GeneratedPrompt,
  type ScoreSet,
} from '../services/index.js';
import type { OrchestratorState, ScoreCache } from '../state/index.js';
import type { LearningCycleCoordinator } from './learning-cycle.js';
import { PipelineTracker } from './pipeline.js';
import {
  BATCH_STAGES,
  GENERATE_STAGES,
  type BatchResult,
  type BatchStage,
  type DailyBatchRequest,
  type GenerateResult,
  type GenerateStage,
  type LearningCycleResult,
  type LikeEvent,
  type LikeOptions,
  type LikeResult,
  type ManualGenerateRequest,
  type StageOutcome,
} from './types.js';

/**
 * Any tracker with a write_prompts stage
 */
interface WriteBackRunner {
  run<T>(name: 'write_prompts', fn: () => Promise<T>): Promise<StageOutcome<T>>;
}

export interface BatchWorkflowDeps {
  state: OrchestratorState;
  scoreCache: ScoreCache;
  learningCycle: LearningCycleCoordinator;
  collaborators: Pick<Collaborators, 'generator' | 'strategist' | 'recordStore'>;
  learning: LearningConfig;
  generation: GenerationConfig;
}

function describeCycle(cycle: LearningCycleResult): string {
  return cycle.success ? 'Learning cycle completed' : `Learning cycle failed at ${cycle.failedStage} stage`;
}

export class BatchWorkflowCoordinator {
  private readonly deps: BatchWorkflowDeps;

  constructor(deps: BatchWorkflowDeps) {
    this.deps = deps;
  }

  // ===========================================================================
  // LIKES
  // ===========================================================================

  /**
   * Count a like and run the learning cycle once the threshold is reached
   */
  async recordLike(event: LikeEvent, options: LikeOptions = {}): Promise<LikeResult> {
    const { state, learningCycle, learning } = this.deps;
    const awaitCycle = options.awaitCycle ?? true;
    const threshold = learning.likeThreshold;

    const likes = state.recordLike();
    console.log(
      `[Likes] Like recorded (${likes}/${threshold})` +
        (event.recordId ? ` record=${event.recordId}` : '') +
        (event.structureId ? ` structure=${event.structureId}` : '')
    );

    if (likes < threshold) {
      return {
        status: 'recorded',
        likesSinceLastRetrain: likes,
        threshold,
        thresholdReached: false,
        retrainTriggered: false,
        message: `Like recorded. ${Math.max(0, threshold - likes)} until next learning cycle.`,
        learningCycle: null,
      };
    }

    console.log(`[Likes] Threshold of ${threshold} reached`);

    if (!awaitCycle) {
      learningCycle.runLearningCycle().catch((error) => {
        console.error('[Likes] Learning cycle crashed:', errorMessage(error));
      });
      return {
        status: 'threshold_reached',
        likesSinceLastRetrain: likes,
        threshold,
        thresholdReached: true,
        retrainTriggered: true,
        message: 'Threshold reached. Learning cycle triggered.',
        learningCycle: null,
      };
    }

    const cycle = await learningCycle.runLearningCycle();
    let message: string;
    if (!cycle.retrainTriggered) {
      message = 'Threshold reached. Learning cycle already handled these likes.';
    } else {
      message = `Threshold reached. ${describeCycle(cycle)}.`;
    }

    return {
      status: 'threshold_reached',
      likesSinceLastRetrain: likes,
      threshold,
      thresholdReached: true,
      retrainTriggered: cycle.retrainTriggered,
      message,
      learningCycle: cycle,
    };
  }

  // ===========================================================================
  // DAILY BATCH
  // ===========================================================================

  /**
   * Run the daily batch. Ideas and prompts are independent: a failure in one
   * is recorded and the other still runs.
   */
  async runDailyBatch(request: DailyBatchRequest = {}): Promise<BatchResult> {
    const { state, collaborators, generation } = this.deps;
    const tracker = new PipelineTracker<BatchStage>('daily_batch', BATCH_STAGES, {
      clock: state.now,
      shortCircuit: false,
    });

    console.log('\n' + '='.repeat(60));
    console.log('DAILY BATCH STARTED');
    console.log('='.repeat(60));

    const errors: string[] = [];
    let cycle: LearningCycleResult | null = null;
    let ideasGenerated = 0;
    let promptsGenerated = 0;
    let promptsWritten = 0;

    const settings = await this.loadBatchSettings();
    const numIdeas = request.numIdeas ?? generation.defaultBatchIdeas;
    const numPrompts = request.numPrompts ?? settings?.numPrompts ?? generation.defaultNumPrompts;
    const renderer = request.renderer ?? settings?.renderer ?? generation.defaultRenderer;

    try {
      cycle = await this.maybeRunCycle(request.forceRetrain ?? false);

      const scores = await this.currentScores();

      await collaborators.strategist.warmUp();
      const ideas = await tracker.run('ideas', () =>
        collaborators.strategist.generateIdeas({
          numIdeas,
          scores,
          explorationRate: this.deps.learning.explorationRate,
        })
      );
      if (ideas.status === 'ok') {
        ideasGenerated = ideas.value.totalGenerated;
      } else if (ideas.status === 'failed') {
        errors.push(`Idea generation failed: ${ideas.error}`);
      }

      await collaborators.generator.warmUp();
      const prompts = await tracker.run('prompts', () => collaborators.generator.generatePrompts(numPrompts, renderer));
      if (prompts.status === 'ok') {
        promptsGenerated = prompts.value.length;
        promptsWritten = await this.writePrompts(tracker, prompts.value);
      } else if (prompts.status === 'failed') {
        errors.push(`Prompt generation failed: ${prompts.error}`);
      }
    } catch (error) {
      console.error('[DailyBatch] Unexpected error:', errorMessage(error));
      errors.push(errorMessage(error));
    }

    const parts: string[] = [];
    if (cycle?.retrainTriggered) {
      parts.push(describeCycle(cycle));
    }
    parts.push(`${ideasGenerated} new structure ideas generated`);
    parts.push(`${promptsGenerated} prompts created`);
    const summary = parts.join('. ') + '.';

    const success = errors.length === 0;
    const error = success ? null : errors.join('; ');
    const retrainTriggered = cycle?.retrainTriggered ?? false;

    state.recordBatch(
      { ideas: ideasGenerated, prompts: promptsGenerated, promptsWritten, retrainTriggered, success },
      error
    );

    console.log('\n' + '='.repeat(60));
    console.log(`DAILY BATCH ${success ? 'COMPLETE' : 'FINISHED WITH ERRORS'}`);
    console.log(summary);
    console.log('='.repeat(60) + '\n');

    return {
      success,
      retrainTriggered,
      ideasGenerated,
      promptsGenerated,
      promptsWritten,
      summary,
      error,
      learningCycle: cycle,
      run: tracker.finish(),
    };
  }

  // ===========================================================================
  // MANUAL GENERATION
  // ===========================================================================

  /**
   * Generate prompts on demand, without idea generation
   */
  async runManualGenerate(request: ManualGenerateRequest = {}): Promise<GenerateResult> {
    const { state, collaborators, generation } = this.deps;
    const tracker = new PipelineTracker<GenerateStage>('manual_generate', GENERATE_STAGES, {
      clock: state.now,
      shortCircuit: false,
    });

    const numPrompts = request.numPrompts ?? generation.defaultNumPrompts;
    const renderer = request.renderer ?? generation.defaultRenderer;

    console.log(`[Generate] Manual generation: ${numPrompts} prompts for ${renderer}`);

    let cycle: LearningCycleResult | null = null;
    let promptsGenerated = 0;
    let promptsWritten = 0;
    let error: string | null = null;

    try {
      cycle = await this.maybeRunCycle(request.forceRetrain ?? false);

      await collaborators.generator.warmUp();
      const prompts = await tracker.run('prompts', () => collaborators.generator.generatePrompts(numPrompts, renderer));
      if (prompts.status === 'ok') {
        promptsGenerated = prompts.value.length;
        promptsWritten = await this.writePrompts(tracker, prompts.value);
      } else if (prompts.status === 'failed') {
        error = `Prompt generation failed: ${prompts.error}`;
      }
    } catch (err) {
      console.error('[Generate] Unexpected error:', errorMessage(err));
      error = errorMessage(err);
    }

    const success = error === null;
    const retrainTriggered = cycle?.retrainTriggered ?? false;

    state.recordGeneration({ prompts: promptsGenerated, promptsWritten, renderer, retrainTriggered, success }, error);

    console.log(`[Generate] ${success ? 'Complete' : 'Failed'}: ${promptsGenerated} prompts, ${promptsWritten} written`);

    return {
      success,
      retrainTriggered,
      promptsGenerated,
      promptsWritten,
      renderer,
      error,
      learningCycle: cycle,
      run: tracker.finish(),
    };
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  private async maybeRunCycle(forceRetrain: boolean): Promise<LearningCycleResult | null> {
    const { learningCycle } = this.deps;
    if (!learningCycle.isCycleNeeded(forceRetrain) && !learningCycle.isRunning()) {
      return null;
    }
    return learningCycle.runLearningCycle(forceRetrain);
  }

  /**
   * Scores for idea generation. Falls back to whatever is cached when the
   * scorer is unreachable.
   */
  private async currentScores(): Promise<ScoreSet> {
    const { scoreCache, state, learning } = this.deps;
    try {
      return await scoreCache.getScores(learning.scoreMaxAgeMs);
    } catch (error) {
      console.warn(`[DailyBatch] Score fetch failed, using cached scores: ${errorMessage(error)}`);
      return state.getCachedScores();
    }
  }

  private async loadBatchSettings(): Promise<BatchSettings | null> {
    const { recordStore } = this.deps.collaborators;
    if (!recordStore.isEnabled()) {
      return null;
    }
    try {
      return await recordStore.fetchBatchSettings();
    } catch (error) {
      console.warn(`[DailyBatch] Could not load batch settings, using defaults: ${errorMessage(error)}`);
      return null;
    }
  }

  /**
   * Write generated prompts back to the record store. A failed write-back is
   * recorded on the run but does not fail the workflow.
   */
  private async writePrompts(tracker: WriteBackRunner, prompts: GeneratedPrompt[]): Promise<number> {
    if (prompts.length === 0) {
      return 0;
    }
    const { recordStore } = this.deps.collaborators;
    const written = await tracker.run('write_prompts', () => recordStore.writePrompts(prompts));
    return written.status === 'ok' ? written.value.written : 0;
  }
}
