import { InterviewState, createInitialState } from '../../models/types';
import { feedbackFixture } from '../../test-utils/fakes';
import { SessionMetrics } from '../observability/sessionMetrics';
import { buildCompactLog, buildDetailedLog, formatFeedback } from './interviewLogFormatter';

const twoTurnState = (): InterviewState => {
  const state = createInitialState();
  state.candidate = { name: 'Alex', technologies: ['Go'] };
  state.turns.push(
    {
      turnId: 1,
      agentMessage: 'Introduce yourself.',
      candidateMessage: 'I am Alex.',
      thoughts: [
        { from: 'Observer', to: 'Interviewer', content: 'introduction', timestamp: new Date('2026-01-01T10:00:00Z') },
        { from: 'Interviewer', to: 'Candidate', content: 'ask about Go', timestamp: new Date('2026-01-01T10:00:01Z') },
      ],
      closed: true,
      createdAt: new Date('2026-01-01T09:59:00Z'),
    },
    {
      turnId: 2,
      agentMessage: 'What is a goroutine?',
      thoughts: [],
      closed: false,
      createdAt: new Date('2026-01-01T10:00:02Z'),
    }
  );
  return state;
};

describe('formatFeedback', () => {
  it('renders an empty review', () => {
    expect(formatFeedback(feedbackFixture()).split('\n')).toEqual([
      'Grade: Middle',
      'Recommendation: Hire (confidence 70%)',
      '',
      'Confirmed skills:',
      '  none',
      'Knowledge gaps:',
      '  none',
      '',
      'Clarity: Good.',
      'Honesty: High.',
      'Engagement: High.',
      '',
      'Roadmap:',
      'Keep going.',
    ]);
  });

  it('lists gaps with their correct answers and roadmap items', () => {
    const feedback = feedbackFixture();
    feedback.technicalReview.knowledgeGaps.push({
      topic: 'Channels',
      isConfirmed: false,
      details: 'mixed up buffering',
      correctAnswer: 'Unbuffered channels block until received.',
    });
    feedback.roadmap.items.push({ topic: 'Channels', priority: 1, reason: 'gap', resources: [] });
    feedback.generalComments = 'Solid start.';

    const text = formatFeedback(feedback);

    expect(text).toContain('  - Channels: mixed up buffering\n    Correct answer: Unbuffered channels block until received.');
    expect(text).toContain('Roadmap:\n  1. Channels: gap\nKeep going.');
    expect(text.endsWith('\n\nSolid start.')).toBe(true);
  });
});

describe('interview logs', () => {
  it('builds the compact log with joined thoughts', () => {
    const log = buildCompactLog(twoTurnState(), null);

    expect(log).toEqual({
      participantName: 'Alex',
      turns: [
        {
          turnId: 1,
          agentVisibleMessage: 'Introduce yourself.',
          userMessage: 'I am Alex.',
          internalThoughts: '[Observer]: introduction\n[Interviewer]: ask about Go',
        },
        { turnId: 2, agentVisibleMessage: 'What is a goroutine?', userMessage: '', internalThoughts: '' },
      ],
      finalFeedback: null,
    });
  });

  it('builds the detailed log with timestamps and metrics', () => {
    const metrics = new SessionMetrics().snapshot();
    const feedback = feedbackFixture();

    const log = buildDetailedLog(twoTurnState(), feedback, metrics);

    expect(log.interviewStats).toEqual({
      totalTurns: 2,
      finalDifficulty: 'BASIC',
      confirmedSkills: [],
      knowledgeGaps: [],
      coveredTopics: [],
    });
    expect(log.turns[0]).toMatchObject({ timestamp: '2026-01-01T09:59:00.000Z', userMessage: 'I am Alex.' });
    expect(log.turns[0].internalThoughts[1]).toEqual({
      from: 'Interviewer',
      to: 'Candidate',
      content: 'ask about Go',
      timestamp: '2026-01-01T10:00:01.000Z',
    });
    expect(log.turns[1].userMessage).toBeNull();
    expect(log.finalFeedback).toBe(feedback);
    expect(log.tokenMetrics).toBe(metrics);
  });
});
