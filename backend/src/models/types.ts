export const DIFFICULTY_LEVELS = ['BASIC', 'INTERMEDIATE', 'ADVANCED', 'EXPERT'] as const;
export type DifficultyLevel = (typeof DIFFICULTY_LEVELS)[number];

export const GRADE_LEVELS = ['Intern', 'Junior', 'Middle', 'Senior', 'Lead'] as const;
export type GradeLevel = (typeof GRADE_LEVELS)[number];

export const RESPONSE_TYPES = [
  'normal',
  'hallucination',
  'off_topic',
  'counter_question',
  'stop_command',
  'introduction',
  'incomplete',
  'excellent',
] as const;
export type ResponseType = (typeof RESPONSE_TYPES)[number];

export const ANSWER_QUALITIES = ['excellent', 'good', 'acceptable', 'poor', 'wrong'] as const;
export type AnswerQuality = (typeof ANSWER_QUALITIES)[number];

export const NEXT_STEPS = ['ask_new', 'repeat', 'follow_up'] as const;
export type NextStep = (typeof NEXT_STEPS)[number];

export type AgentName = 'Observer' | 'Interviewer' | 'Evaluator';

export interface CandidateInfo {
  name?: string;
  position?: string;
  targetGrade?: GradeLevel;
  experience?: string;
  technologies: string[];
}

/** Partial candidate data pulled out of a single message; grade is still raw text. */
export interface ExtractedCandidateInfo {
  name?: string;
  position?: string;
  grade?: string;
  experience?: string;
  technologies: string[];
}

export interface InternalThought {
  from: AgentName;
  to: AgentName | 'Candidate';
  content: string;
  timestamp: Date;
}

export interface TurnClassification {
  responseType: ResponseType;
  isFactuallyCorrect: boolean;
  detectedTopics: string[];
  correctAnswer?: string;
}

export interface InterviewTurn {
  turnId: number;
  agentMessage: string;
  candidateMessage?: string;
  thoughts: InternalThought[];
  classification?: TurnClassification;
  closed: boolean;
  createdAt: Date;
}

export interface KnowledgeGap {
  topic: string;
  note?: string;
  correctAnswer?: string;
}

export interface InterviewState {
  turns: InterviewTurn[];
  candidate: CandidateInfo;
  coveredTopics: string[];
  confirmedSkills: string[];
  knowledgeGaps: KnowledgeGap[];
  currentDifficulty: DifficultyLevel;
  consecutiveGoodAnswers: number;
  consecutiveBadAnswers: number;
  turnCounter: number;
  jobDescription?: string;
}

export type ReadonlyInterviewState = {
  readonly [K in keyof InterviewState]: Readonly<InterviewState[K]>;
};

export interface ObserverAnalysis {
  responseType: ResponseType;
  quality: AnswerQuality;
  isFactuallyCorrect: boolean;
  isGibberish: boolean;
  answeredLastQuestion: boolean;
  detectedTopics: string[];
  extractedInfo?: ExtractedCandidateInfo;
  recommendation: string;
  nextStep: NextStep;
  correctAnswer?: string;
  shouldIncreaseDifficulty: boolean;
  shouldSimplify: boolean;
  demonstratedLevel?: string;
  thoughts: InternalThought[];
}

export type HiringRecommendation = 'Strong Hire' | 'Hire' | 'No Hire';
export type ClarityLevel = 'Excellent' | 'Good' | 'Average' | 'Poor';

export interface SkillAssessment {
  topic: string;
  isConfirmed: boolean;
  details: string;
  correctAnswer?: string;
}

export interface RoadmapItem {
  topic: string;
  priority: number;
  reason: string;
  resources: string[];
}

export interface InterviewFeedback {
  verdict: {
    grade: GradeLevel;
    hiringRecommendation: HiringRecommendation;
    confidenceScore: number;
  };
  technicalReview: {
    confirmedSkills: SkillAssessment[];
    knowledgeGaps: SkillAssessment[];
  };
  softSkillsReview: {
    clarity: ClarityLevel;
    clarityDetails: string;
    honesty: string;
    honestyDetails: string;
    engagement: string;
    engagementDetails: string;
  };
  roadmap: {
    items: RoadmapItem[];
    summary: string;
  };
  generalComments: string;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export const createInitialState = (jobDescription?: string): InterviewState => ({
  turns: [],
  candidate: { technologies: [] },
  coveredTopics: [],
  confirmedSkills: [],
  knowledgeGaps: [],
  currentDifficulty: 'BASIC',
  consecutiveGoodAnswers: 0,
  consecutiveBadAnswers: 0,
  turnCounter: 0,
  jobDescription,
});
