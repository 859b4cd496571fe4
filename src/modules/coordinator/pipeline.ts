/**
 * Pipeline Stage Tracker
 *
 * Runs the stages of one pipeline execution and records each outcome as a
 * tagged value instead of letting errors escape. In short-circuit mode a
 * failed stage stops every later stage, which then stays `pending`.
 */

import { errorMessage } from '../services/index.js';
import type { Clock } from '../state/index.js';
import type { PipelineKind, PipelineRun, StageOutcome, StageRecord } from './types.js';

export interface PipelineTrackerOptions {
  clock: Clock;
  /** Skip all remaining stages after the first failure (default: true) */
  shortCircuit?: boolean;
}

export class PipelineTracker<S extends string> {
  readonly kind: PipelineKind;
  private readonly clock: Clock;
  private readonly shortCircuit: boolean;
  private readonly startedAt: Date;
  private readonly stages: StageRecord<S>[];
  private firstFailure: { stage: S; error: string } | null = null;

  constructor(kind: PipelineKind, stageNames: readonly S[], options: PipelineTrackerOptions) {
    this.kind = kind;
    this.clock = options.clock;
    this.shortCircuit = options.shortCircuit ?? true;
    this.startedAt = this.clock();
    this.stages = stageNames.map((name) => ({ name, status: 'pending' }));
  }

  /**
   * Run a stage with error handling
   */
  async run<T>(name: S, fn: () => Promise<T>): Promise<StageOutcome<T>> {
    const stage = this.stages.find((s) => s.name === name);
    if (!stage) {
      throw new Error(`Unknown ${this.kind} stage: ${name}`);
    }

    if (this.shortCircuit && this.firstFailure) {
      return { status: 'pending' };
    }

    stage.startedAt = this.clock().toISOString();
    console.log(`\n--- Stage: ${name.toUpperCase()} ---`);

    try {
      const value = await fn();
      stage.status = 'ok';
      stage.finishedAt = this.clock().toISOString();
      console.log(`Stage ${name} completed successfully`);
      return { status: 'ok', value };
    } catch (error) {
      const message = errorMessage(error);

      stage.status = 'failed';
      stage.finishedAt = this.clock().toISOString();
      stage.error = message;
      if (!this.firstFailure) {
        this.firstFailure = { stage: name, error: message };
      }

      console.error(`Stage ${name} failed: ${message}`);
      return { status: 'failed', error: message };
    }
  }

  statusOf(name: S): StageRecord<S>['status'] | undefined {
    return this.stages.find((s) => s.name === name)?.status;
  }

  get failedStage(): S | null {
    return this.firstFailure?.stage ?? null;
  }

  get error(): string | null {
    return this.firstFailure?.error ?? null;
  }

  /**
   * Snapshot the run. Stages that never ran remain `pending`.
   */
  finish(): PipelineRun<S> {
    return {
      kind: this.kind,
      startedAt: this.startedAt.toISOString(),
      finishedAt: this.clock().toISOString(),
      stages: this.stages.map((stage) => ({ ...stage })),
      overallSuccess: this.firstFailure === null,
    };
  }
}
