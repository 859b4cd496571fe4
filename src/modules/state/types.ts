/**
 * State Module Types
 */

import type { ScoreSet } from '../services/index.js';

/**
 * Outcome of the last daily batch, kept for /status
 */
export interface BatchRecord {
  ideas: number;
  prompts: number;
  promptsWritten: number;
  retrainTriggered: boolean;
  success: boolean;
}

/**
 * Outcome of the last manual generation, kept for /status
 */
export interface GenerationRecord {
  prompts: number;
  promptsWritten: number;
  renderer: string;
  retrainTriggered: boolean;
  success: boolean;
}

/**
 * Everything a learning cycle changes, applied in one step
 */
export interface CycleCommit {
  /** Whether the train stage succeeded; the cycle only counts if it did */
  trained: boolean;
  /** Likes snapshotted when the cycle started */
  consumedLikes: number;
  /** Fresh scores, when the score stage produced them */
  scores?: ScoreSet;
  error: string | null;
}

/**
 * Serializable view of the orchestrator state
 */
export interface StateSnapshot {
  likesSinceLastRetrain: number;
  lastRetrainAt: string | null;
  lastLikeAt: string | null;
  totalRetrains: number;
  totalLikesProcessed: number;
  isRetraining: boolean;
  lastError: string | null;
  lastBatchAt: string | null;
  totalBatches: number;
  lastBatchResult: BatchRecord | null;
  lastGenerationAt: string | null;
  totalGenerations: number;
  lastGenerationResult: GenerationRecord | null;
  scoresCachedAt: string | null;
  cachedScoresCount: number;
}

export interface CachedScores {
  scores: ScoreSet;
  cachedAt: string | null;
  isFresh: boolean;
  count: number;
}
