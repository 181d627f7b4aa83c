import {
  InterviewFeedback,
  ObserverAnalysis,
  ReadonlyInterviewState,
  TokenUsage,
} from '../models/types';
import { CompactInterviewLog, DetailedInterviewLog } from '../models/InterviewLog';
import { InterviewLogWriter } from '../repositories/interviewLogRepository';
import { SessionSnapshot, SessionStateCacheWriter } from '../repositories/sessionStateCache';
import { EvaluatorDecision, InterviewerDecision, InterviewerReply, ObserverDecision } from '../services/ai/types';
import { BackendRequest, BackendResponse, CompletionBackend } from '../services/llm/types';
import { AggregateMetrics, ObservabilityCollaborator, SpanAttributes } from '../services/observability/types';

export const usage = (inputTokens: number, outputTokens: number): TokenUsage => ({
  inputTokens,
  outputTokens,
  totalTokens: inputTokens + outputTokens,
});

type Scripted<T> = T | Error;

const next = <T>(queue: Scripted<T>[], label: string): T => {
  const item = queue.shift();
  if (item === undefined) {
    throw new Error(`${label}: no scripted response left`);
  }
  if (item instanceof Error) throw item;
  return item;
};

/** Completion backend that replays scripted texts or errors in order. */
export class ScriptedBackend implements CompletionBackend {
  readonly requests: BackendRequest[] = [];
  private readonly queue: Scripted<BackendResponse>[];

  constructor(...responses: (string | Error | BackendResponse)[]) {
    this.queue = responses.map((response) =>
      typeof response === 'string' ? { text: response, usage: usage(10, 5) } : response
    );
  }

  async createCompletion(request: BackendRequest): Promise<BackendResponse> {
    this.requests.push(request);
    return next(this.queue, 'ScriptedBackend');
  }
}

export const analysisFixture = (overrides: Partial<ObserverAnalysis> = {}): ObserverAnalysis => ({
  responseType: 'normal',
  quality: 'acceptable',
  isFactuallyCorrect: true,
  isGibberish: false,
  answeredLastQuestion: true,
  detectedTopics: [],
  recommendation: 'Continue.',
  nextStep: 'ask_new',
  shouldIncreaseDifficulty: false,
  shouldSimplify: false,
  thoughts: [{ from: 'Observer', to: 'Interviewer', content: 'noted', timestamp: new Date(0) }],
  ...overrides,
});

export const feedbackFixture = (): InterviewFeedback => ({
  verdict: { grade: 'Middle', hiringRecommendation: 'Hire', confidenceScore: 70 },
  technicalReview: { confirmedSkills: [], knowledgeGaps: [] },
  softSkillsReview: {
    clarity: 'Good',
    clarityDetails: '',
    honesty: 'High',
    honestyDetails: '',
    engagement: 'High',
    engagementDetails: '',
  },
  roadmap: { items: [], summary: 'Keep going.' },
  generalComments: '',
});

export class FakeObserver implements ObserverDecision {
  readonly calls: { candidateMessage: string; activeQuestion?: string }[] = [];
  /** Runs inside analyze(), before the scripted result is returned. */
  onAnalyze?: () => void | Promise<void>;
  private readonly queue: Scripted<ObserverAnalysis>[];

  constructor(...responses: Scripted<ObserverAnalysis>[]) {
    this.queue = responses;
  }

  push(...responses: Scripted<ObserverAnalysis>[]): void {
    this.queue.push(...responses);
  }

  async analyze(
    _state: ReadonlyInterviewState,
    candidateMessage: string,
    activeQuestion?: string
  ): Promise<ObserverAnalysis> {
    this.calls.push({ candidateMessage, activeQuestion });
    await this.onAnalyze?.();
    return next(this.queue, 'FakeObserver');
  }
}

export class FakeInterviewer implements InterviewerDecision {
  greetings = 0;
  readonly replies: string[] = [];
  private readonly queue: Scripted<string>[];
  private greetingFailures: Error[] = [];
  onRespond?: () => void | Promise<void>;
  onGreeting?: () => void | Promise<void>;

  constructor(...replies: Scripted<string>[]) {
    this.queue = replies;
  }

  push(...replies: Scripted<string>[]): void {
    this.queue.push(...replies);
  }

  failNextGreeting(error: Error): void {
    this.greetingFailures.push(error);
  }

  async generateGreeting(): Promise<string> {
    await this.onGreeting?.();
    const failure = this.greetingFailures.shift();
    if (failure) throw failure;
    this.greetings++;
    return 'Hello! Please introduce yourself.';
  }

  async respond(): Promise<InterviewerReply> {
    await this.onRespond?.();
    const reply = next(this.queue, 'FakeInterviewer');
    this.replies.push(reply);
    return {
      reply,
      thoughts: [{ from: 'Interviewer', to: 'Candidate', content: `asked: ${reply}`, timestamp: new Date(0) }],
    };
  }
}

export class FakeEvaluator implements EvaluatorDecision {
  calls = 0;
  private readonly queue: Scripted<InterviewFeedback>[];

  constructor(...responses: Scripted<InterviewFeedback>[]) {
    this.queue = responses;
  }

  async evaluate(): Promise<InterviewFeedback> {
    this.calls++;
    return next(this.queue, 'FakeEvaluator');
  }
}

export interface ObservedEvent {
  type: 'startTrace' | 'addSpan' | 'recordGeneration' | 'finalizeTrace';
  sessionId: string;
  name?: string;
  attributes?: SpanAttributes;
  usage?: TokenUsage;
  metrics?: AggregateMetrics;
}

export class RecordingObservability implements ObservabilityCollaborator {
  readonly events: ObservedEvent[] = [];

  startTrace(sessionId: string, metadata?: SpanAttributes): void {
    this.events.push({ type: 'startTrace', sessionId, attributes: metadata });
  }

  addSpan(sessionId: string, name: string, attributes: SpanAttributes): void {
    this.events.push({ type: 'addSpan', sessionId, name, attributes });
  }

  recordGeneration(sessionId: string, generationName: string, tokens: TokenUsage): void {
    this.events.push({ type: 'recordGeneration', sessionId, name: generationName, usage: tokens });
  }

  finalizeTrace(sessionId: string, metrics: AggregateMetrics): void {
    this.events.push({ type: 'finalizeTrace', sessionId, metrics });
  }

  spanNames(): string[] {
    return this.events.flatMap((event) => (event.type === 'addSpan' && event.name ? [event.name] : []));
  }
}

export class RecordingLogWriter implements InterviewLogWriter {
  readonly compact: CompactInterviewLog[] = [];
  readonly detailed: DetailedInterviewLog[] = [];

  async saveCompactLog(_sessionId: string, log: CompactInterviewLog): Promise<void> {
    this.compact.push(log);
  }

  async saveDetailedLog(_sessionId: string, log: DetailedInterviewLog): Promise<void> {
    this.detailed.push(log);
  }
}

export class RecordingStateCache implements SessionStateCacheWriter {
  readonly saved: { phase: SessionSnapshot['phase']; turnCounter: number }[] = [];

  async save(snapshot: SessionSnapshot): Promise<void> {
    this.saved.push({ phase: snapshot.phase, turnCounter: snapshot.state.turnCounter });
  }
}
