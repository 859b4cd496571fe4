/**
 * Learning Cycle Coordinator
 *
 * Runs the five-stage learning cycle when enough likes have accumulated (or
 * when forced):
 * 1. Train: retrain the optimizer on the latest feedback
 * 2. Score: score every prompt structure
 * 3. Insights: fetch structure/prompt insights for the scored structures
 * 4. Update preferences: push scores and insights to the generator
 * 5. Persist scores: write each score to the record store
 *
 * A failed stage skips the rest; side effects of earlier stages stay in
 * place. Train is the commit point: only a successful train consumes the
 * likes and counts as a retrain.
 *
 * At most one cycle runs at a time. Callers that arrive while a cycle is in
 * flight wait for it, then re-check the like threshold.
 */

import type { LearningConfig } from '../config/index.js';
import { toScoreSet, type Collaborators, type ScoreSet } from '../services/index.js';
import type { OrchestratorState } from '../state/index.js';
import { PipelineTracker } from './pipeline.js';
import { LEARNING_STAGES, type LearningCycleResult, type LearningStage } from './types.js';

type LearningCollaborators = Pick<Collaborators, 'optimizer' | 'generator' | 'recordStore'>;

export class LearningCycleCoordinator {
  private readonly state: OrchestratorState;
  private readonly collaborators: LearningCollaborators;
  private readonly config: Pick<LearningConfig, 'likeThreshold' | 'explorationRate'>;
  private inFlight: Promise<LearningCycleResult> | null = null;

  constructor(
    state: OrchestratorState,
    collaborators: LearningCollaborators,
    config: Pick<LearningConfig, 'likeThreshold' | 'explorationRate'>
  ) {
    this.state = state;
    this.collaborators = collaborators;
    this.config = config;
  }

  /**
   * Whether a cycle should run now
   */
  isCycleNeeded(forceRetrain: boolean = false): boolean {
    return forceRetrain || this.state.likesSinceLastRetrain >= this.config.likeThreshold;
  }

  isRunning(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Resolves once no cycle is running
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }
  }

  /**
   * Run the learning cycle if it is needed. Never rejects: stage failures
   * are reported in the result.
   */
  async runLearningCycle(forceRetrain: boolean = false): Promise<LearningCycleResult> {
    let force = forceRetrain;
    let waitedOn: LearningCycleResult | null = null;

    while (this.inFlight) {
      console.log('[LearningCycle] Cycle already running - waiting for it to finish');
      waitedOn = await this.inFlight;
      // The cycle we waited on satisfies a forced request
      force = false;
    }

    if (!this.isCycleNeeded(force)) {
      if (waitedOn && forceRetrain) {
        return { ...waitedOn, coalesced: true };
      }
      return {
        success: true,
        retrainTriggered: false,
        coalesced: waitedOn !== null,
        failedStage: null,
        error: null,
        scoresCached: 0,
        run: null,
      };
    }

    // No await between the check above and this assignment
    const cycle = this.execute().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  private async execute(): Promise<LearningCycleResult> {
    const consumedLikes = this.state.beginCycle();
    const tracker = new PipelineTracker<LearningStage>('learning_cycle', LEARNING_STAGES, {
      clock: this.state.now,
    });

    console.log('\n' + '='.repeat(60));
    console.log('LEARNING CYCLE STARTED');
    console.log(`Likes since last retrain: ${consumedLikes}`);
    console.log('='.repeat(60));

    const scores = await this.runStages(tracker);

    const trained = tracker.statusOf('train') === 'ok';
    const run = tracker.finish();
    const error = tracker.error === null ? null : `${tracker.failedStage} stage failed: ${tracker.error}`;

    this.state.commitCycle({ trained, consumedLikes, scores, error });

    console.log('\n' + '='.repeat(60));
    console.log(`LEARNING CYCLE ${run.overallSuccess ? 'COMPLETE' : 'FAILED'}`);
    if (tracker.failedStage) {
      console.log(`Failed stage: ${tracker.failedStage}`);
      console.log(trained ? 'Training committed; likes consumed' : 'Training not committed; likes kept for retry');
    }
    console.log('='.repeat(60) + '\n');

    return {
      success: run.overallSuccess,
      retrainTriggered: true,
      coalesced: false,
      failedStage: tracker.failedStage,
      error,
      scoresCached: scores ? Object.keys(scores).length : 0,
      run,
    };
  }

  /**
   * Run the stages in order, stopping at the first failure
   *
   * @returns the scores from the score stage, if it got that far
   */
  private async runStages(tracker: PipelineTracker<LearningStage>): Promise<ScoreSet | undefined> {
    const { optimizer, generator, recordStore } = this.collaborators;

    const train = await tracker.run('train', () => optimizer.train());
    if (train.status !== 'ok') return undefined;

    const scored = await tracker.run('score', () => optimizer.scoreStructures());
    if (scored.status !== 'ok') return undefined;

    const scores = toScoreSet(scored.value);
    const { globalPreferenceVector } = scored.value;

    const insights = await tracker.run('insights', () => optimizer.getStructureInsights(Object.keys(scores)));
    if (insights.status !== 'ok') return scores;
    const structurePromptInsights = insights.value.insights;

    const updated = await tracker.run('update_preferences', () =>
      generator.updatePreferences({
        globalPreferenceVector,
        explorationRate: this.config.explorationRate,
        structureScores: scores,
        structurePromptInsights,
      })
    );
    if (updated.status !== 'ok') return scores;

    await tracker.run('persist_scores', () => recordStore.writeScores(scores));
    return scores;
  }
}
