import { describe, it, expect, vi } from 'vitest';
import { PipelineTracker } from './pipeline.js';
import { manualClock } from '../../test/fakes.js';

const STAGES = ['first', 'second', 'third'] as const;
type Stage = (typeof STAGES)[number];

describe('PipelineTracker', () => {
  it('records each successful stage and the overall success', async () => {
    const tracker = new PipelineTracker<Stage>('learning_cycle', STAGES, { clock: manualClock().now });

    const outcome = await tracker.run('first', async () => 42);
    await tracker.run('second', async () => 'ok');
    await tracker.run('third', async () => null);

    expect(outcome).toEqual({ status: 'ok', value: 42 });
    const run = tracker.finish();
    expect(run.overallSuccess).toBe(true);
    expect(run.stages.map((s) => s.status)).toEqual(['ok', 'ok', 'ok']);
    expect(run.stages[0]).toEqual({
      name: 'first',
      status: 'ok',
      startedAt: '2025-01-01T00:00:00.000Z',
      finishedAt: '2025-01-01T00:00:00.000Z',
    });
  });

  it('turns a thrown error into a failed outcome', async () => {
    const tracker = new PipelineTracker<Stage>('learning_cycle', STAGES, { clock: manualClock().now });

    const outcome = await tracker.run('first', async () => {
      throw new Error('optimizer offline');
    });

    expect(outcome).toEqual({ status: 'failed', error: 'optimizer offline' });
    expect(tracker.failedStage).toBe('first');
    expect(tracker.error).toBe('optimizer offline');
  });

  it('skips later stages after a failure in short-circuit mode', async () => {
    const tracker = new PipelineTracker<Stage>('learning_cycle', STAGES, { clock: manualClock().now });
    const third = vi.fn(async () => 'never');

    await tracker.run('first', async () => 1);
    await tracker.run('second', async () => {
      throw new Error('bad scores');
    });
    const skipped = await tracker.run('third', third);

    expect(skipped).toEqual({ status: 'pending' });
    expect(third).not.toHaveBeenCalled();
    const run = tracker.finish();
    expect(run.overallSuccess).toBe(false);
    expect(run.stages.map((s) => s.status)).toEqual(['ok', 'failed', 'pending']);
    expect(run.stages[1]?.error).toBe('bad scores');
  });

  it('keeps running stages when short-circuit is off', async () => {
    const tracker = new PipelineTracker<Stage>('daily_batch', STAGES, {
      clock: manualClock().now,
      shortCircuit: false,
    });

    await tracker.run('first', async () => {
      throw new Error('no ideas');
    });
    const second = await tracker.run('second', async () => 12);

    expect(second).toEqual({ status: 'ok', value: 12 });
    expect(tracker.statusOf('first')).toBe('failed');
    expect(tracker.statusOf('third')).toBe('pending');
    expect(tracker.failedStage).toBe('first');
  });

  it('keeps the first failure when several stages fail', async () => {
    const tracker = new PipelineTracker<Stage>('daily_batch', STAGES, {
      clock: manualClock().now,
      shortCircuit: false,
    });

    await tracker.run('first', async () => {
      throw new Error('one');
    });
    await tracker.run('second', async () => {
      throw new Error('two');
    });

    expect(tracker.failedStage).toBe('first');
    expect(tracker.error).toBe('one');
  });
});
