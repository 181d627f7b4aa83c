import { usage } from '../../test-utils/fakes';
import { SessionMetrics } from './sessionMetrics';
import { LangfuseTracker } from './langfuseTracker';

const settings = { host: 'http://langfuse.test', publicKey: 'pk-test', secretKey: 'sk-test' };

const setup = () => {
  const post = jest.fn().mockResolvedValue({ status: 207 });
  const tracker = new LangfuseTracker(settings, { post });
  const events = () =>
    post.mock.calls.map(([path, payload]) => {
      expect(path).toBe('/api/public/ingestion');
      expect(payload.batch).toHaveLength(1);
      return payload.batch[0];
    });
  return { post, tracker, events };
};

describe('LangfuseTracker', () => {
  it('sends spans and generations under one trace per session', async () => {
    const { tracker, events } = setup();

    await tracker.startTrace('s1', { model: 'test-model' });
    await tracker.addSpan('s1', 'observer', { turnId: 1 });
    await tracker.recordGeneration('s1', 'observer_analysis', usage(12, 8));

    const [trace, span, generation] = events();
    expect(trace).toMatchObject({
      type: 'trace-create',
      body: { name: 'interview_session', sessionId: 's1', metadata: { model: 'test-model' } },
    });
    expect(span).toMatchObject({ type: 'span-create', body: { traceId: trace.body.id, name: 'observer' } });
    expect(generation).toMatchObject({
      type: 'generation-create',
      body: {
        traceId: trace.body.id,
        name: 'observer_analysis',
        usage: { input: 12, output: 8, total: 20, unit: 'TOKENS' },
      },
    });
  });

  it('updates the trace with metrics on finalize and then forgets it', async () => {
    const { tracker, events } = setup();
    const metrics = new SessionMetrics().snapshot();

    await tracker.startTrace('s1');
    await tracker.finalizeTrace('s1', metrics);
    await tracker.startTrace('s1');

    const [first, final, second] = events();
    expect(final.body).toEqual({ id: first.body.id, sessionId: 's1', metadata: { token_metrics: metrics } });
    expect(second.body.id).not.toBe(first.body.id);
  });

  it('keeps traces of different sessions apart', async () => {
    const { tracker, events } = setup();

    await tracker.startTrace('s1');
    await tracker.startTrace('s2');

    const [a, b] = events();
    expect(a.body.id).not.toBe(b.body.id);
  });

  it('propagates ingestion failures to the caller', async () => {
    const { tracker, post } = setup();
    post.mockRejectedValueOnce(new Error('503'));

    await expect(tracker.addSpan('s1', 'observer', {})).rejects.toThrow('503');
  });
});
