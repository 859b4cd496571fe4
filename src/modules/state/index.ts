/**
 * State Module
 *
 * In-memory orchestrator state and the score cache built on top of it.
 */

export * from './types.js';
export { OrchestratorState, type Clock } from './store.js';
export { ScoreCache, type ScoreFetcher } from './score-cache.js';
