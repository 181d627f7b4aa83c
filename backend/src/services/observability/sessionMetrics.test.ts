import { usage } from '../../test-utils/fakes';
import { SessionMetrics } from './sessionMetrics';

describe('SessionMetrics', () => {
  it('splits usage by the agent named in the generation', () => {
    const metrics = new SessionMetrics();
    metrics.addGeneration('observer_analysis', usage(100, 20));
    metrics.addGeneration('interviewer_response', usage(50, 30));
    metrics.addGeneration('interviewer_greeting', usage(10, 10));
    metrics.addGeneration('evaluator_feedback', usage(200, 100));
    metrics.incrementTurn();

    const snapshot = metrics.snapshot();

    expect(snapshot.total).toEqual({ inputTokens: 360, outputTokens: 160, totalTokens: 520 });
    expect(snapshot.generationCount).toBe(4);
    expect(snapshot.byAgent.interviewer).toEqual({ inputTokens: 60, outputTokens: 40, totalTokens: 100, calls: 2 });
    expect(snapshot.byAgent.observer.calls).toBe(1);
    expect(snapshot.byAgent.evaluator.totalTokens).toBe(300);
  });

  it('counts unnamed generations only in the total', () => {
    const metrics = new SessionMetrics();
    metrics.addGeneration('warmup', usage(5, 5));

    const snapshot = metrics.snapshot();

    expect(snapshot.total.totalTokens).toBe(10);
    expect(snapshot.byAgent.observer.calls + snapshot.byAgent.interviewer.calls).toBe(0);
  });

  it('derives totalTokens when the provider reports zero', () => {
    const metrics = new SessionMetrics();
    metrics.addGeneration('observer_analysis', { inputTokens: 7, outputTokens: 3, totalTokens: 0 });

    expect(metrics.snapshot().total.totalTokens).toBe(10);
  });

  it('rounds averages to two decimals and avoids dividing by zero', () => {
    const metrics = new SessionMetrics();
    expect(metrics.snapshot()).toMatchObject({ avgTokensPerTurn: 0, avgTokensPerGeneration: 0 });

    metrics.addGeneration('observer_analysis', usage(50, 50));
    metrics.incrementTurn();
    metrics.incrementTurn();
    metrics.incrementTurn();

    expect(metrics.snapshot()).toMatchObject({ turnCount: 3, avgTokensPerTurn: 33.33, avgTokensPerGeneration: 100 });
  });

  it('returns copies that later generations do not change', () => {
    const metrics = new SessionMetrics();
    metrics.addGeneration('observer_analysis', usage(1, 1));
    const before = metrics.snapshot();

    metrics.addGeneration('observer_analysis', usage(1, 1));

    expect(before.byAgent.observer.calls).toBe(1);
  });
});
