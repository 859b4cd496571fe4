/**
 * Orchestrator State
 *
 * Counters, timestamps and cached scores shared by the coordinators. One
 * instance is created at start-up and injected wherever it is needed.
 *
 * Every mutator is synchronous: the event loop runs each one to completion,
 * so concurrent requests can never observe or produce a half-applied update.
 * Nothing here awaits.
 */

import type { ScoreSet } from '../services/index.js';
import type { BatchRecord, CycleCommit, GenerationRecord, StateSnapshot } from './types.js';

export type Clock = () => Date;

function iso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

export class OrchestratorState {
  readonly now: Clock;

  // Learning cycle
  private likes = 0;
  private lastRetrainAt: Date | null = null;
  private lastLikeAt: Date | null = null;
  private retrains = 0;
  private likesProcessed = 0;
  private retraining = false;
  private lastError: string | null = null;

  // Daily batch
  private lastBatchAt: Date | null = null;
  private batches = 0;
  private lastBatchResult: BatchRecord | null = null;

  // Manual generation
  private lastGenerationAt: Date | null = null;
  private generations = 0;
  private lastGenerationResult: GenerationRecord | null = null;

  // Score cache
  private cachedScores: ScoreSet = {};
  private scoresCachedAt: Date | null = null;
  private scoresRevision = 0;

  constructor(clock: Clock = () => new Date()) {
    this.now = clock;
  }

  get likesSinceLastRetrain(): number {
    return this.likes;
  }

  get totalRetrains(): number {
    return this.retrains;
  }

  get totalLikesProcessed(): number {
    return this.likesProcessed;
  }

  get totalBatches(): number {
    return this.batches;
  }

  get totalGenerations(): number {
    return this.generations;
  }

  get isRetraining(): boolean {
    return this.retraining;
  }

  get scoresFetchedAt(): Date | null {
    return this.scoresCachedAt;
  }

  /**
   * Bumped on every score write
   */
  get scoresVersion(): number {
    return this.scoresRevision;
  }

  /**
   * Count one like
   *
   * @returns likes since the last retrain, after the increment
   */
  recordLike(): number {
    this.likes++;
    this.likesProcessed++;
    this.lastLikeAt = this.now();
    return this.likes;
  }

  /**
   * Admin reset of the like counter. Totals are left alone.
   */
  resetLikes(): void {
    this.likes = 0;
  }

  /**
   * Mark a learning cycle as started
   *
   * @returns the likes the cycle will consume if it commits
   */
  beginCycle(): number {
    this.retraining = true;
    this.lastError = null;
    return this.likes;
  }

  /**
   * Apply the outcome of a learning cycle. Likes that arrived while the
   * cycle ran are kept.
   */
  commitCycle(commit: CycleCommit): void {
    if (commit.scores) {
      this.storeScores(commit.scores);
    }

    if (commit.trained) {
      this.likes = Math.max(0, this.likes - commit.consumedLikes);
      this.lastRetrainAt = this.now();
      this.retrains++;
    }

    this.lastError = commit.error;
    this.retraining = false;
  }

  recordBatch(result: BatchRecord, error: string | null): void {
    this.lastBatchAt = this.now();
    this.batches++;
    this.lastBatchResult = result;
    if (error) this.lastError = error;
  }

  recordGeneration(result: GenerationRecord, error: string | null): void {
    this.lastGenerationAt = this.now();
    this.generations++;
    this.lastGenerationResult = result;
    if (error) this.lastError = error;
  }

  /**
   * Overwrite the cached scores and stamp them with the current time
   */
  storeScores(scores: ScoreSet): void {
    this.cachedScores = { ...scores };
    this.scoresCachedAt = this.now();
    this.scoresRevision++;
  }

  getCachedScores(): ScoreSet {
    return { ...this.cachedScores };
  }

  getStatus(): StateSnapshot {
    return {
      likesSinceLastRetrain: this.likes,
      lastRetrainAt: iso(this.lastRetrainAt),
      lastLikeAt: iso(this.lastLikeAt),
      totalRetrains: this.retrains,
      totalLikesProcessed: this.likesProcessed,
      isRetraining: this.retraining,
      lastError: this.lastError,
      lastBatchAt: iso(this.lastBatchAt),
      totalBatches: this.batches,
      lastBatchResult: this.lastBatchResult,
      lastGenerationAt: iso(this.lastGenerationAt),
      totalGenerations: this.generations,
      lastGenerationResult: this.lastGenerationResult,
      scoresCachedAt: iso(this.scoresCachedAt),
      cachedScoresCount: Object.keys(this.cachedScores).length,
    };
  }
}
