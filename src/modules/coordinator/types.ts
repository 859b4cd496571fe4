/**
 * Coordinator Module Types
 *
 * Request and result shapes for the learning cycle, the daily batch, manual
 * generation and like events.
 */

// =============================================================================
// PIPELINE RUNS
// =============================================================================

export type PipelineKind = 'learning_cycle' | 'daily_batch' | 'manual_generate';

/**
 * Learning-cycle stages in execution order
 */
export const LEARNING_STAGES = ['train', 'score', 'insights', 'update_preferences', 'persist_scores'] as const;
export type LearningStage = (typeof LEARNING_STAGES)[number];

/**
 * Generation stages. Ideas and prompts are independent deliverables; the
 * write-back only runs when prompts were produced.
 */
export const BATCH_STAGES = ['ideas', 'prompts', 'write_prompts'] as const;
export type BatchStage = (typeof BATCH_STAGES)[number];

export const GENERATE_STAGES = ['prompts', 'write_prompts'] as const;
export type GenerateStage = (typeof GENERATE_STAGES)[number];

export type StageStatus = 'pending' | 'ok' | 'failed';

/**
 * Outcome of a single stage
 */
export type StageOutcome<T> =
  | { status: 'pending' }
  | { status: 'ok'; value: T }
  | { status: 'failed'; error: string };

export interface StageRecord<S extends string = string> {
  name: S;
  status: StageStatus;
  startedAt?: string;
  finishedAt?: string;
  error?: string;
}

/**
 * One execution of a pipeline. Returned with the result, never persisted.
 */
export interface PipelineRun<S extends string = string> {
  kind: PipelineKind;
  startedAt: string;
  finishedAt: string;
  stages: StageRecord<S>[];
  overallSuccess: boolean;
}

// =============================================================================
// LEARNING CYCLE
// =============================================================================

export interface LearningCycleResult {
  success: boolean;
  /** Whether a pipeline ran (or, when coalesced, the one waited on) */
  retrainTriggered: boolean;
  /** True when this caller waited on another caller's cycle instead of running one */
  coalesced: boolean;
  failedStage: LearningStage | null;
  error: string | null;
  /** Structures scored by this cycle */
  scoresCached: number;
  run: PipelineRun<LearningStage> | null;
}

// =============================================================================
// DAILY BATCH
// =============================================================================

export interface DailyBatchRequest {
  forceRetrain?: boolean;
  numIdeas?: number;
  numPrompts?: number;
  renderer?: string;
}

export interface BatchResult {
  success: boolean;
  retrainTriggered: boolean;
  ideasGenerated: number;
  promptsGenerated: number;
  promptsWritten: number;
  summary: string;
  error: string | null;
  learningCycle: LearningCycleResult | null;
  run: PipelineRun<BatchStage>;
}

// =============================================================================
// MANUAL GENERATION
// =============================================================================

export interface ManualGenerateRequest {
  numPrompts?: number;
  renderer?: string;
  forceRetrain?: boolean;
}

export interface GenerateResult {
  success: boolean;
  retrainTriggered: boolean;
  promptsGenerated: number;
  promptsWritten: number;
  renderer: string;
  error: string | null;
  learningCycle: LearningCycleResult | null;
  run: PipelineRun<GenerateStage>;
}

// =============================================================================
// LIKE EVENTS
// =============================================================================

export interface LikeEvent {
  recordId?: string;
  structureId?: string;
  imageUrl?: string;
}

export interface LikeOptions {
  /**
   * Wait for a triggered learning cycle before returning (default: true).
   * The HTTP route answers immediately and lets the cycle run on.
   */
  awaitCycle?: boolean;
}

export interface LikeResult {
  status: 'recorded' | 'threshold_reached';
  /** Counter value right after this like was counted */
  likesSinceLastRetrain: number;
  threshold: number;
  thresholdReached: boolean;
  retrainTriggered: boolean;
  message: string;
  learningCycle: LearningCycleResult | null;
}
