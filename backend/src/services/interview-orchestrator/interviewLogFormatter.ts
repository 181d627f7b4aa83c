import { InterviewFeedback, ReadonlyInterviewState } from '../../models/types';
import { CompactInterviewLog, DetailedInterviewLog } from '../../models/InterviewLog';
import { AggregateMetrics } from '../observability/types';

const participantName = (state: ReadonlyInterviewState): string => state.candidate.name ?? 'Candidate';

export const formatFeedback = (feedback: InterviewFeedback): string => {
  const { verdict, technicalReview, softSkillsReview, roadmap } = feedback;
  const lines = [
    `Grade: ${verdict.grade}`,
    `Recommendation: ${verdict.hiringRecommendation} (confidence ${verdict.confidenceScore}%)`,
    '',
    'Confirmed skills:',
    ...(technicalReview.confirmedSkills.length
      ? technicalReview.confirmedSkills.map((skill) => `  + ${skill.topic}: ${skill.details}`)
      : ['  none']),
    'Knowledge gaps:',
    ...(technicalReview.knowledgeGaps.length
      ? technicalReview.knowledgeGaps.flatMap((gap) => [
          `  - ${gap.topic}: ${gap.details}`,
          ...(gap.correctAnswer ? [`    Correct answer: ${gap.correctAnswer}`] : []),
        ])
      : ['  none']),
    '',
    `Clarity: ${softSkillsReview.clarity}. ${softSkillsReview.clarityDetails}`.trim(),
    `Honesty: ${softSkillsReview.honesty}. ${softSkillsReview.honestyDetails}`.trim(),
    `Engagement: ${softSkillsReview.engagement}. ${softSkillsReview.engagementDetails}`.trim(),
    '',
    'Roadmap:',
    ...roadmap.items.map((item) => `  ${item.priority}. ${item.topic}: ${item.reason}`),
    roadmap.summary,
  ];

  if (feedback.generalComments) {
    lines.push('', feedback.generalComments);
  }

  return lines.join('\n');
};

export const buildCompactLog = (
  state: ReadonlyInterviewState,
  feedback: InterviewFeedback | null
): CompactInterviewLog => ({
  participantName: participantName(state),
  turns: state.turns.map((turn) => ({
    turnId: turn.turnId,
    agentVisibleMessage: turn.agentMessage,
    userMessage: turn.candidateMessage ?? '',
    internalThoughts: turn.thoughts.map((thought) => `[${thought.from}]: ${thought.content}`).join('\n'),
  })),
  finalFeedback: feedback ? formatFeedback(feedback) : null,
});

export const buildDetailedLog = (
  state: ReadonlyInterviewState,
  feedback: InterviewFeedback | null,
  tokenMetrics: AggregateMetrics
): DetailedInterviewLog => ({
  participantName: participantName(state),
  candidateInfo: { ...state.candidate, technologies: [...state.candidate.technologies] },
  interviewStats: {
    totalTurns: state.turns.length,
    finalDifficulty: state.currentDifficulty,
    confirmedSkills: [...state.confirmedSkills],
    knowledgeGaps: state.knowledgeGaps.map((gap) => ({ ...gap })),
    coveredTopics: [...state.coveredTopics],
  },
  turns: state.turns.map((turn) => ({
    turnId: turn.turnId,
    timestamp: turn.createdAt.toISOString(),
    agentVisibleMessage: turn.agentMessage,
    userMessage: turn.candidateMessage ?? null,
    internalThoughts: turn.thoughts.map((thought) => ({
      from: thought.from,
      to: thought.to,
      content: thought.content,
      timestamp: thought.timestamp.toISOString(),
    })),
  })),
  finalFeedback: feedback,
  tokenMetrics,
});
