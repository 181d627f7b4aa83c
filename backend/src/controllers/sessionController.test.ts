import { ApiError } from '../middlewares/errorHandler';
import { parseConfigInput } from './sessionController';

describe('parseConfigInput', () => {
  it('treats a missing body as no overrides', () => {
    expect(parseConfigInput(undefined)).toEqual({});
  });

  it('reads top-level fields and agent overrides, accepting numeric strings', () => {
    expect(
      parseConfigInput({
        model: 'test-model',
        maxTurns: '8',
        jobDescription: 'Go backend',
        agents: { observer: { temperature: 0.2 }, evaluator: { maxTokens: '2000' }, unknown: { maxTokens: 1 } },
      })
    ).toEqual({
      model: 'test-model',
      maxTurns: 8,
      jobDescription: 'Go backend',
      agents: {
        observer: { temperature: 0.2, maxTokens: undefined, generationRetries: undefined },
        evaluator: { temperature: undefined, maxTokens: 2000, generationRetries: undefined },
      },
    });
  });

  it('rejects non-numeric values with a 400', () => {
    expect(() => parseConfigInput({ maxTurns: 'many' })).toThrow(new ApiError(400, 'maxTurns must be a number'));
    expect(() => parseConfigInput({ agents: { interviewer: { temperature: 'hot' } } })).toThrow(
      'agents.interviewer.temperature must be a number'
    );
  });

  it('rejects a body that is not an object', () => {
    expect(() => parseConfigInput(['x'])).toThrow('Request body must be a JSON object');
  });
});
