import { describe, it, expect, vi } from 'vitest';
import { OrchestratorState } from './store.js';
import { ScoreCache } from './score-cache.js';
import { gate, manualClock } from '../../test/fakes.js';

describe('ScoreCache', () => {
  const MAX_AGE = 60_000;

  function setup() {
    const clock = manualClock();
    const state = new OrchestratorState(clock.now);
    const fetchScores = vi.fn(async () => ({ s1: 0.8 }));
    const cache = new ScoreCache(state, fetchScores);
    return { clock, state, fetchScores, cache };
  }

  it('fetches once and serves repeat reads within the max age from memory', async () => {
    const { clock, fetchScores, cache } = setup();

    expect(await cache.getScores(MAX_AGE)).toEqual({ s1: 0.8 });
    clock.advance(MAX_AGE);
    expect(await cache.getScores(MAX_AGE)).toEqual({ s1: 0.8 });

    expect(fetchScores).toHaveBeenCalledTimes(1);
  });

  it('refetches once the max age has passed', async () => {
    const { clock, fetchScores, cache } = setup();

    await cache.getScores(MAX_AGE);
    clock.advance(MAX_AGE + 1);
    await cache.getScores(MAX_AGE);

    expect(fetchScores).toHaveBeenCalledTimes(2);
  });

  it('shares one fetch between concurrent readers', async () => {
    const { fetchScores, cache } = setup();

    const [first, second] = await Promise.all([cache.getScores(MAX_AGE), cache.getScores(MAX_AGE)]);

    expect(first).toEqual({ s1: 0.8 });
    expect(second).toEqual({ s1: 0.8 });
    expect(fetchScores).toHaveBeenCalledTimes(1);
  });

  it('propagates fetch failures and keeps the old entry', async () => {
    const { clock, state, fetchScores, cache } = setup();
    cache.setScores({ old: 0.2 });
    clock.advance(MAX_AGE + 1);
    fetchScores.mockRejectedValueOnce(new Error('scorer down'));

    await expect(cache.getScores(MAX_AGE)).rejects.toThrow('scorer down');
    expect(state.getCachedScores()).toEqual({ old: 0.2 });
  });

  it('keeps scores stored by a learning cycle that finished during a slow refresh', async () => {
    const clock = manualClock();
    const state = new OrchestratorState(clock.now);
    const fetchGate = gate();
    const cache = new ScoreCache(state, async () => {
      await fetchGate.promise;
      return { s1: 0.1 };
    });

    const pending = cache.getScores(MAX_AGE);
    state.beginCycle();
    state.commitCycle({ trained: true, consumedLikes: 0, scores: { s1: 0.95 }, error: null });
    fetchGate.release();

    expect(await pending).toEqual({ s1: 0.95 });
    expect(state.getCachedScores()).toEqual({ s1: 0.95 });
    expect(cache.isFresh(MAX_AGE)).toBe(true);
  });

  it('treats scores set directly as fresh', async () => {
    const { fetchScores, cache } = setup();

    cache.setScores({ s9: 0.3 });

    expect(await cache.getScores(MAX_AGE)).toEqual({ s9: 0.3 });
    expect(fetchScores).not.toHaveBeenCalled();
  });

  it('peeks without fetching', () => {
    const { clock, fetchScores, cache } = setup();

    expect(cache.peek(MAX_AGE)).toEqual({ scores: {}, cachedAt: null, isFresh: false, count: 0 });

    cache.setScores({ a: 0.1, b: 0.2 });
    clock.advance(MAX_AGE + 1);

    expect(cache.peek(MAX_AGE)).toEqual({
      scores: { a: 0.1, b: 0.2 },
      cachedAt: '2025-01-01T00:00:00.000Z',
      isFresh: false,
      count: 2,
    });
    expect(fetchScores).not.toHaveBeenCalled();
  });
});
