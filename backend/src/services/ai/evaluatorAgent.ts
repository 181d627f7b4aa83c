import {
  ClarityLevel,
  GRADE_LEVELS,
  GradeLevel,
  HiringRecommendation,
  InterviewFeedback,
  ReadonlyInterviewState,
  RoadmapItem,
  SkillAssessment,
} from '../../models/types';
import {
  Payload,
  booleanOr,
  clamp,
  matchEnum,
  optionalNumber,
  optionalRecord,
  optionalString,
  recordList,
  requireRecord,
  stringList,
  stringOr,
} from '../../utils/payload';
import { AgentContext, BaseAgent } from './baseAgent';
import { EvaluatorDecision } from './types';

const EVALUATOR_SYSTEM_PROMPT = `You are the Evaluator agent of a technical interview system.
You receive the full transcript and the notes collected during the interview and write the final report.

Judge only what happened in the interview.
- Confidently stated false facts are a critical red flag: they lower honesty and belong in knowledge_gaps.
- Counter-questions about the job are a sign of engagement; dodging questions is not.
- Compare the claimed grade with the demonstrated one and mention any mismatch.
- When a job description is given, say which of its requirements the candidate covers and which not.
- Every knowledge gap gets the correct answer.

Respond with JSON only:
{
  "verdict": {"grade": "Intern|Junior|Middle|Senior|Lead", "hiring_recommendation": "Strong Hire|Hire|No Hire", "confidence_score": 0-100},
  "technical_review": {
    "confirmed_skills": [{"topic": "...", "is_confirmed": true, "details": "...", "correct_answer": null}],
    "knowledge_gaps": [{"topic": "...", "is_confirmed": false, "details": "...", "correct_answer": "..."}]
  },
  "soft_skills_review": {
    "clarity": "Excellent|Good|Average|Poor", "clarity_details": "...",
    "honesty": "High|Questionable|Low", "honesty_details": "...",
    "engagement": "High|Medium|Low", "engagement_details": "..."
  },
  "roadmap": {"items": [{"topic": "...", "priority": 1, "reason": "...", "resources": ["..."]}], "summary": "..."},
  "general_comments": "..."
}`;

const CLARITY_LEVELS: readonly ClarityLevel[] = ['Excellent', 'Good', 'Average', 'Poor'];

export const parseGrade = (value: unknown): GradeLevel => matchEnum(value, GRADE_LEVELS) ?? 'Junior';

export const parseHiringRecommendation = (value: unknown): HiringRecommendation => {
  const lower = typeof value === 'string' ? value.toLowerCase() : '';
  if (/(^|[^a-z])no([^a-z]|$)/.test(lower)) return 'No Hire';
  if (lower.includes('strong')) return 'Strong Hire';
  return lower.includes('hire') ? 'Hire' : 'No Hire';
};

const parseSkill = (raw: Payload, confirmedByDefault: boolean): SkillAssessment | undefined => {
  const topic = optionalString(raw, 'topic');
  if (!topic) return undefined;

  return {
    topic,
    isConfirmed: booleanOr(raw, 'is_confirmed', confirmedByDefault),
    details: stringOr(raw, 'details', ''),
    correctAnswer: optionalString(raw, 'correct_answer'),
  };
};

const parseSkills = (payload: Payload, key: string, confirmedByDefault: boolean): SkillAssessment[] =>
  recordList(payload, key).flatMap((raw) => parseSkill(raw, confirmedByDefault) ?? []);

const parseRoadmapItem = (raw: Payload): RoadmapItem | undefined => {
  const topic = optionalString(raw, 'topic');
  if (!topic) return undefined;

  return {
    topic,
    priority: Math.round(clamp(optionalNumber(raw, 'priority') ?? 3, 1, 5)),
    reason: stringOr(raw, 'reason', ''),
    resources: stringList(raw, 'resources'),
  };
};

/**
 * Validates the evaluator payload. `verdict` and `technical_review` are
 * required; everything else falls back to neutral values.
 */
export const parseFeedbackPayload = (payload: Payload): InterviewFeedback => {
  const verdict = requireRecord(payload, 'verdict');
  const technical = requireRecord(payload, 'technical_review');
  const soft = optionalRecord(payload, 'soft_skills_review') ?? {};
  const roadmap = optionalRecord(payload, 'roadmap') ?? {};

  const items = recordList(roadmap, 'items')
    .flatMap((raw) => parseRoadmapItem(raw) ?? [])
    .sort((a, b) => a.priority - b.priority);

  return {
    verdict: {
      grade: parseGrade(verdict.grade),
      hiringRecommendation: parseHiringRecommendation(verdict.hiring_recommendation),
      confidenceScore: Math.round(clamp(optionalNumber(verdict, 'confidence_score') ?? 50, 0, 100)),
    },
    technicalReview: {
      confirmedSkills: parseSkills(technical, 'confirmed_skills', true),
      knowledgeGaps: parseSkills(technical, 'knowledge_gaps', false),
    },
    softSkillsReview: {
      clarity: matchEnum(soft.clarity, CLARITY_LEVELS) ?? 'Average',
      clarityDetails: stringOr(soft, 'clarity_details', ''),
      honesty: stringOr(soft, 'honesty', 'Undetermined'),
      honestyDetails: stringOr(soft, 'honesty_details', ''),
      engagement: stringOr(soft, 'engagement', 'Undetermined'),
      engagementDetails: stringOr(soft, 'engagement_details', ''),
    },
    roadmap: {
      items,
      summary: stringOr(roadmap, 'summary', 'No development plan was produced.'),
    },
    generalComments: stringOr(payload, 'general_comments', ''),
  };
};

/**
 * Adds knowledge gaps the model left out: turns classified as hallucination or
 * factually incorrect, and gaps recorded during the interview.
 */
export const appendNegativeEvidence = (
  feedback: InterviewFeedback,
  state: ReadonlyInterviewState
): InterviewFeedback => {
  const gaps = [...feedback.technicalReview.knowledgeGaps];
  const known = new Set(gaps.map((gap) => gap.topic.toLowerCase()));

  const add = (gap: SkillAssessment) => {
    const key = gap.topic.toLowerCase();
    if (known.has(key)) return;
    known.add(key);
    gaps.push(gap);
  };

  for (const turn of state.turns) {
    const classification = turn.classification;
    if (!turn.closed || !classification) continue;
    if (classification.responseType !== 'hallucination' && classification.isFactuallyCorrect) continue;

    add({
      topic: classification.detectedTopics[0] ?? `Turn ${turn.turnId}`,
      isConfirmed: false,
      details:
        classification.responseType === 'hallucination'
          ? `Stated false facts: "${turn.candidateMessage ?? ''}"`
          : `Factually incorrect answer: "${turn.candidateMessage ?? ''}"`,
      correctAnswer: classification.correctAnswer,
    });
  }

  for (const gap of state.knowledgeGaps) {
    add({
      topic: gap.topic,
      isConfirmed: false,
      details: gap.note ?? 'Gap recorded during the interview.',
      correctAnswer: gap.correctAnswer,
    });
  }

  return { ...feedback, technicalReview: { ...feedback.technicalReview, knowledgeGaps: gaps } };
};

export class EvaluatorAgent extends BaseAgent implements EvaluatorDecision {
  protected readonly systemPrompt = EVALUATOR_SYSTEM_PROMPT;

  constructor(context: AgentContext) {
    super('Evaluator', context);
  }

  async evaluate(state: ReadonlyInterviewState): Promise<InterviewFeedback> {
    const messages = this.buildMessages(this.buildEvaluationContext(state));

    const feedback = await this.generate('evaluator_feedback', async () => {
      const completion = await this.context.gateway.completeStructured(
        messages,
        this.completionOptions('evaluator_feedback')
      );
      return parseFeedbackPayload(completion.payload);
    });

    return appendNegativeEvidence(feedback, state);
  }

  private buildEvaluationContext(state: ReadonlyInterviewState): string {
    const { candidate } = state;
    const info = [`Name: ${candidate.name ?? 'Unknown'}`];
    if (candidate.position) info.push(`Position: ${candidate.position}`);
    if (candidate.targetGrade) info.push(`Target grade: ${candidate.targetGrade}`);
    if (candidate.experience) info.push(`Stated experience: ${candidate.experience}`);

    return `CANDIDATE:
${info.join('\n')}

STATS:
Turns: ${state.turns.length}
Final difficulty: ${state.currentDifficulty}
${BaseAgent.buildJobDescriptionBlock(state.jobDescription)}
TRANSCRIPT:
${this.formatTranscript(state)}

PRELIMINARY SKILLS:
${this.formatSkills(state)}

Write the final report.`;
  }

  private formatTranscript(state: ReadonlyInterviewState): string {
    return state.turns
      .map((turn) => {
        const lines = [`[Interviewer]: ${turn.agentMessage}`];
        if (turn.candidateMessage) lines.push(`[Candidate]: ${turn.candidateMessage}`);
        if (turn.thoughts.length) lines.push(`[Notes]: ${turn.thoughts.map((t) => t.content).join('; ')}`);
        return lines.join('\n');
      })
      .join('\n\n');
  }

  private formatSkills(state: ReadonlyInterviewState): string {
    const lines: string[] = [];

    if (state.confirmedSkills.length) {
      lines.push('Confirmed:', ...state.confirmedSkills.map((skill) => `  + ${skill}`));
    }
    if (state.knowledgeGaps.length) {
      lines.push('Gaps:');
      for (const gap of state.knowledgeGaps) {
        lines.push(`  - ${gap.topic}`);
        if (gap.correctAnswer) lines.push(`    Correct answer: ${gap.correctAnswer}`);
      }
    }
    if (state.coveredTopics.length) {
      lines.push(`Covered topics: ${state.coveredTopics.join(', ')}`);
    }

    return lines.length ? lines.join('\n') : 'No data';
  }
}
