import { InterviewState, createInitialState } from '../../models/types';
import { PayloadValidationError } from '../../utils/errors';
import { ScriptedBackend, feedbackFixture } from '../../test-utils/fakes';
import { CompletionGateway } from '../llm/completionGateway';
import {
  EvaluatorAgent,
  appendNegativeEvidence,
  parseFeedbackPayload,
  parseHiringRecommendation,
} from './evaluatorAgent';

const stateWithHallucination = (): InterviewState => {
  const state = createInitialState();
  state.turns.push(
    {
      turnId: 1,
      agentMessage: 'Which Java version added records?',
      candidateMessage: 'Java 30, released last year.',
      thoughts: [],
      classification: {
        responseType: 'hallucination',
        isFactuallyCorrect: false,
        detectedTopics: ['Java versions'],
        correctAnswer: 'Java 16',
      },
      closed: true,
      createdAt: new Date(0),
    },
    {
      turnId: 2,
      agentMessage: 'What is a stream?',
      candidateMessage: 'A compact way to build lists.',
      thoughts: [],
      classification: { responseType: 'normal', isFactuallyCorrect: true, detectedTopics: ['streams'] },
      closed: true,
      createdAt: new Date(0),
    }
  );
  state.knowledgeGaps.push({ topic: 'Concurrency', note: 'Confused threads and coroutines' });
  return state;
};

describe('parseFeedbackPayload', () => {
  it('normalises verdict fields and sorts the roadmap', () => {
    const feedback = parseFeedbackPayload({
      verdict: { grade: 'SENIOR', hiring_recommendation: 'strong hire!', confidence_score: 140 },
      technical_review: {
        confirmed_skills: [{ topic: 'SQL', details: 'joins' }, { details: 'no topic' }],
        knowledge_gaps: [{ topic: 'Indexes', details: 'unclear', correct_answer: 'B-trees' }],
      },
      soft_skills_review: { clarity: 'good' },
      roadmap: {
        items: [
          { topic: 'Indexes', priority: 9, reason: 'gap' },
          { topic: 'Testing', priority: '2', reason: 'habit', resources: ['docs'] },
        ],
      },
    });

    expect(feedback.verdict).toEqual({ grade: 'Senior', hiringRecommendation: 'Strong Hire', confidenceScore: 100 });
    expect(feedback.technicalReview.confirmedSkills).toEqual([
      { topic: 'SQL', isConfirmed: true, details: 'joins', correctAnswer: undefined },
    ]);
    expect(feedback.technicalReview.knowledgeGaps[0]).toMatchObject({ topic: 'Indexes', isConfirmed: false });
    expect(feedback.softSkillsReview.clarity).toBe('Good');
    expect(feedback.roadmap.items.map((item) => [item.topic, item.priority])).toEqual([
      ['Testing', 2],
      ['Indexes', 5],
    ]);
    expect(feedback.roadmap.summary).toBe('No development plan was produced.');
  });

  it('defaults unknown grade and clarity', () => {
    const feedback = parseFeedbackPayload({
      verdict: { grade: 'Principal' },
      technical_review: {},
      soft_skills_review: { clarity: 'crystal' },
    });
    expect(feedback.verdict.grade).toBe('Junior');
    expect(feedback.verdict.confidenceScore).toBe(50);
    expect(feedback.softSkillsReview.clarity).toBe('Average');
  });

  it('requires verdict and technical_review', () => {
    expect(() => parseFeedbackPayload({ technical_review: {} })).toThrow(PayloadValidationError);
    expect(() => parseFeedbackPayload({ verdict: {} })).toThrow('technical_review');
  });
});

describe('parseHiringRecommendation', () => {
  it.each([
    ['Strong Hire', 'Strong Hire'],
    ['Hire', 'Hire'],
    ['No Hire', 'No Hire'],
    ['Strong No Hire', 'No Hire'],
    ['strong_no_hire', 'No Hire'],
    ['strong_hire', 'Strong Hire'],
    ['maybe', 'No Hire'],
  ])('maps %s to %s', (raw, expected) => {
    expect(parseHiringRecommendation(raw)).toBe(expected);
  });
});

describe('appendNegativeEvidence', () => {
  it('adds hallucinated turns and recorded gaps the model left out', () => {
    const feedback = appendNegativeEvidence(feedbackFixture(), stateWithHallucination());

    expect(feedback.technicalReview.knowledgeGaps).toEqual([
      {
        topic: 'Java versions',
        isConfirmed: false,
        details: 'Stated false facts: "Java 30, released last year."',
        correctAnswer: 'Java 16',
      },
      { topic: 'Concurrency', isConfirmed: false, details: 'Confused threads and coroutines', correctAnswer: undefined },
    ]);
  });

  it('skips topics already listed', () => {
    const base = feedbackFixture();
    base.technicalReview.knowledgeGaps.push({ topic: 'java VERSIONS', isConfirmed: false, details: 'listed' });

    const feedback = appendNegativeEvidence(base, stateWithHallucination());

    expect(feedback.technicalReview.knowledgeGaps.map((gap) => gap.topic)).toEqual(['java VERSIONS', 'Concurrency']);
  });
});

describe('EvaluatorAgent', () => {
  it('evaluates the transcript and appends negative evidence', async () => {
    const backend = new ScriptedBackend(
      JSON.stringify({
        verdict: { grade: 'Junior', hiring_recommendation: 'No Hire', confidence_score: 80 },
        technical_review: { confirmed_skills: [{ topic: 'streams', details: 'fine' }], knowledge_gaps: [] },
      })
    );
    const agent = new EvaluatorAgent({
      gateway: new CompletionGateway(backend, { maxRetries: 0, backoffBaseMs: 1, backoffMaxMs: 1, timeoutMs: 1000 }),
      model: 'test-model',
      config: { temperature: 0.3, maxTokens: 3000, generationRetries: 2 },
    });

    const feedback = await agent.evaluate(stateWithHallucination());

    expect(feedback.verdict.hiringRecommendation).toBe('No Hire');
    expect(feedback.technicalReview.knowledgeGaps.map((gap) => gap.topic)).toEqual(['Java versions', 'Concurrency']);
    expect(backend.requests[0].messages[1].content).toContain('[Candidate]: Java 30, released last year.');
  });
});
