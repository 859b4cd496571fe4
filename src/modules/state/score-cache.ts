/**
 * Score Cache
 *
 * Single-entry cache over the scores held in OrchestratorState. Reads within
 * the staleness bound are served from memory; older (or missing) scores are
 * refetched, and concurrent refreshes share one fetch. A refresh never
 * overwrites scores written after it started.
 */

import type { ScoreSet } from '../services/index.js';
import type { OrchestratorState } from './store.js';
import type { CachedScores } from './types.js';

export type ScoreFetcher = () => Promise<ScoreSet>;

export class ScoreCache {
  private readonly state: OrchestratorState;
  private readonly fetchScores: ScoreFetcher;
  private refresh: Promise<ScoreSet> | null = null;

  constructor(state: OrchestratorState, fetchScores: ScoreFetcher) {
    this.state = state;
    this.fetchScores = fetchScores;
  }

  /**
   * Cached scores if fetched no more than maxAgeMs ago, otherwise fresh ones
   */
  async getScores(maxAgeMs: number): Promise<ScoreSet> {
    if (this.isFresh(maxAgeMs)) {
      return this.state.getCachedScores();
    }

    if (!this.refresh) {
      console.log('[ScoreCache] Fetching fresh scores');
      const startVersion = this.state.scoresVersion;
      this.refresh = this.fetchScores()
        .then((scores) => {
          // Scores stored while this fetch was in flight (by a learning cycle) are newer
          if (this.state.scoresVersion !== startVersion) {
            console.log('[ScoreCache] Newer scores stored during refresh - discarding fetched scores');
            return this.state.getCachedScores();
          }
          this.state.storeScores(scores);
          console.log(`[ScoreCache] Cached ${Object.keys(scores).length} structure scores`);
          return scores;
        })
        .finally(() => {
          this.refresh = null;
        });
    }

    return this.refresh;
  }

  setScores(scores: ScoreSet): void {
    this.state.storeScores(scores);
  }

  isFresh(maxAgeMs: number): boolean {
    const cachedAt = this.state.scoresFetchedAt;
    if (!cachedAt) {
      return false;
    }
    return this.state.now().getTime() - cachedAt.getTime() <= maxAgeMs;
  }

  /**
   * Current cache contents without triggering a fetch
   */
  peek(maxAgeMs: number): CachedScores {
    const scores = this.state.getCachedScores();
    return {
      scores,
      cachedAt: this.state.scoresFetchedAt?.toISOString() ?? null,
      isFresh: this.isFresh(maxAgeMs),
      count: Object.keys(scores).length,
    };
  }
}
