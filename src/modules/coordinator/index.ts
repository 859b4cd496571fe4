/**
 * Coordinator Module
 *
 * Wires the shared state, score cache and both coordinators together.
 */

import type { AppConfig } from '../config/index.js';
import { toScoreSet, type Collaborators } from '../services/index.js';
import { OrchestratorState, ScoreCache, type Clock } from '../state/index.js';
import { BatchWorkflowCoordinator } from './batch.js';
import { LearningCycleCoordinator } from './learning-cycle.js';

export * from './types.js';
export { PipelineTracker, type PipelineTrackerOptions } from './pipeline.js';
export { LearningCycleCoordinator } from './learning-cycle.js';
export { BatchWorkflowCoordinator, type BatchWorkflowDeps } from './batch.js';

export interface Orchestrator {
  config: AppConfig;
  state: OrchestratorState;
  scoreCache: ScoreCache;
  learningCycle: LearningCycleCoordinator;
  workflows: BatchWorkflowCoordinator;
  collaborators: Collaborators;
}

export function createOrchestrator(config: AppConfig, collaborators: Collaborators, clock?: Clock): Orchestrator {
  const state = new OrchestratorState(clock);
  const scoreCache = new ScoreCache(state, async () => toScoreSet(await collaborators.optimizer.scoreStructures()));
  const learningCycle = new LearningCycleCoordinator(state, collaborators, config.learning);
  const workflows = new BatchWorkflowCoordinator({
    state,
    scoreCache,
    learningCycle,
    collaborators,
    learning: config.learning,
    generation: config.generation,
  });

  return { config, state, scoreCache, learningCycle, workflows, collaborators };
}
