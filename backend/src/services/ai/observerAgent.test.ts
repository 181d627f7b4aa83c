import { createInitialState } from '../../models/types';
import { AgentError, CompletionError, PayloadValidationError } from '../../utils/errors';
import { ScriptedBackend } from '../../test-utils/fakes';
import { CompletionGateway } from '../llm/completionGateway';
import { ObserverAgent, parseObserverPayload, resolveAnsweredLastQuestion } from './observerAgent';

const gatewayFor = (backend: ScriptedBackend) =>
  new CompletionGateway(backend, { maxRetries: 0, backoffBaseMs: 1, backoffMaxMs: 1, timeoutMs: 1000 });

const agentFor = (backend: ScriptedBackend, generationRetries = 2) =>
  new ObserverAgent({
    gateway: gatewayFor(backend),
    model: 'test-model',
    config: { temperature: 0.3, maxTokens: 1000, generationRetries },
  });

beforeEach(() => {
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('resolveAnsweredLastQuestion', () => {
  it('treats gibberish as unanswered even when the model says otherwise', () => {
    expect(resolveAnsweredLastQuestion(true, true, 'normal')).toBe(false);
  });

  it('uses an explicit boolean over the policy table', () => {
    expect(resolveAnsweredLastQuestion(false, true, 'off_topic')).toBe(true);
    expect(resolveAnsweredLastQuestion(false, false, 'normal')).toBe(false);
  });

  it.each([
    ['off_topic', false],
    ['counter_question', false],
    ['stop_command', false],
    ['hallucination', true],
    ['incomplete', true],
    ['normal', true],
  ] as const)('falls back to the policy for %s', (responseType, expected) => {
    expect(resolveAnsweredLastQuestion(false, undefined, responseType)).toBe(expected);
  });
});

describe('parseObserverPayload', () => {
  it('applies defaults to a minimal payload', () => {
    const analysis = parseObserverPayload({ response_type: 'normal' });

    expect(analysis).toMatchObject({
      responseType: 'normal',
      quality: 'acceptable',
      isFactuallyCorrect: true,
      isGibberish: false,
      answeredLastQuestion: true,
      detectedTopics: [],
      nextStep: 'ask_new',
      shouldIncreaseDifficulty: false,
      shouldSimplify: false,
    });
    expect(analysis.extractedInfo).toBeUndefined();
  });

  it('forces both signals off when the question was not answered', () => {
    const analysis = parseObserverPayload({
      response_type: 'counter_question',
      quality: 'good',
      should_increase_difficulty: true,
      should_simplify: true,
    });

    expect(analysis.answeredLastQuestion).toBe(false);
    expect(analysis.shouldIncreaseDifficulty).toBe(false);
    expect(analysis.shouldSimplify).toBe(false);
    expect(analysis.nextStep).toBe('repeat');
  });

  it('keeps signals for answered questions', () => {
    const analysis = parseObserverPayload({
      response_type: 'excellent',
      quality: 'Excellent',
      should_increase_difficulty: true,
    });

    expect(analysis.quality).toBe('excellent');
    expect(analysis.shouldIncreaseDifficulty).toBe(true);
  });

  it('accepts "question" as a counter-question', () => {
    expect(parseObserverPayload({ response_type: 'question' }).responseType).toBe('counter_question');
  });

  it('derives follow_up for incomplete answers without a valid next_step', () => {
    expect(parseObserverPayload({ response_type: 'incomplete', next_step: 'whatever' }).nextStep).toBe('follow_up');
  });

  it('rejects an unknown response type', () => {
    expect(() => parseObserverPayload({ response_type: 'rambling' })).toThrow(PayloadValidationError);
    expect(() => parseObserverPayload({})).toThrow(PayloadValidationError);
  });

  it('rejects an unknown quality', () => {
    expect(() => parseObserverPayload({ response_type: 'normal', quality: 'meh' })).toThrow('quality');
  });

  it('keeps only usable candidate info', () => {
    const analysis = parseObserverPayload({
      response_type: 'introduction',
      extracted_info: { name: ' Alex ', position: '', grade: 42, technologies: ['Java', '', 7, ' SQL '] },
    });

    expect(analysis.extractedInfo).toEqual({
      name: 'Alex',
      position: undefined,
      grade: undefined,
      experience: undefined,
      technologies: ['Java', 'SQL'],
    });
  });

  it('drops an all-empty info block', () => {
    const analysis = parseObserverPayload({
      response_type: 'introduction',
      extracted_info: { name: null, position: '  ', technologies: [] },
    });
    expect(analysis.extractedInfo).toBeUndefined();
  });

  it('passes thoughts and reasoning to the interviewer', () => {
    const now = new Date(1000);
    const analysis = parseObserverPayload({ response_type: 'normal', thoughts: 'solid' }, 'step by step', now);

    expect(analysis.thoughts).toEqual([
      { from: 'Observer', to: 'Interviewer', content: 'solid', timestamp: now },
      { from: 'Observer', to: 'Interviewer', content: 'Reasoning: step by step', timestamp: now },
    ]);
  });
});

describe('ObserverAgent', () => {
  it('analyses a message through the gateway', async () => {
    const backend = new ScriptedBackend(
      '<reasoning>on topic</reasoning><r>{"response_type": "normal", "quality": "good", "detected_topics": ["JIT"]}</r>'
    );

    const analysis = await agentFor(backend).analyze(createInitialState(), 'The JIT compiles hot bytecode.', 'What is the JIT?');

    expect(analysis.quality).toBe('good');
    expect(analysis.detectedTopics).toEqual(['JIT']);
    const prompt = backend.requests[0].messages[1].content;
    expect(prompt).toContain('<user_input>\nThe JIT compiles hot bytecode.\n</user_input>');
    expect(prompt).toContain('ACTIVE QUESTION:\nWhat is the JIT?');
  });

  it('regenerates after an unusable payload', async () => {
    const backend = new ScriptedBackend('not json', '{"response_type": "nonsense"}', '{"response_type": "off_topic"}');

    const analysis = await agentFor(backend).analyze(createInitialState(), 'hi');

    expect(analysis.responseType).toBe('off_topic');
    expect(backend.requests).toHaveLength(3);
  });

  it('raises AgentError once regenerations are exhausted', async () => {
    const backend = new ScriptedBackend('nothing', 'still nothing');

    await expect(agentFor(backend, 1).analyze(createInitialState(), 'hi')).rejects.toThrow(AgentError);
    expect(backend.requests).toHaveLength(2);
  });

  it('regenerates when JSON mode rejects the generated output', async () => {
    const backend = new ScriptedBackend(
      new CompletionError('invalid_output', 'json_validate_failed', 400),
      '{"response_type": "normal"}'
    );

    const analysis = await agentFor(backend).analyze(createInitialState(), 'hi');

    expect(analysis.responseType).toBe('normal');
    expect(backend.requests).toHaveLength(2);
  });

  it('does not regenerate after a gateway failure', async () => {
    const backend = new ScriptedBackend(new CompletionError('client_error', 'bad key', 401), '{"response_type": "normal"}');

    await expect(agentFor(backend).analyze(createInitialState(), 'hi')).rejects.toMatchObject({
      name: 'AgentError',
      agent: 'Observer',
    });
    expect(backend.requests).toHaveLength(1);
  });
});
