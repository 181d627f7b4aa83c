import {
  AgentName,
  DifficultyLevel,
  InterviewFeedback,
  InterviewState,
  InterviewTurn,
  KnowledgeGap,
  ObserverAnalysis,
  ReadonlyInterviewState,
  createInitialState,
} from '../../models/types';
import { AgentError, InvalidStateError, describeError } from '../../utils/errors';
import { deepFreeze } from '../../utils/deepFreeze';
import { EvaluatorDecision, InterviewerDecision, InterviewerReply, ObserverDecision } from '../ai/types';
import { SessionTelemetry } from '../observability/sessionTelemetry';
import { InterviewLogWriter } from '../../repositories/interviewLogRepository';
import { SessionPhase, SessionStateCacheWriter } from '../../repositories/sessionStateCache';
import { DifficultySnapshot, adjustDifficulty } from './difficultyController';
import { initialDifficultyFor, mergeCandidateInfo } from './candidateInfo';
import { buildCompactLog, buildDetailedLog } from './interviewLogFormatter';
import { InterviewConfig } from './interviewConfig';

export interface OrchestratorDependencies {
  observer: ObserverDecision;
  interviewer: InterviewerDecision;
  evaluator: EvaluatorDecision;
  telemetry: SessionTelemetry;
  logWriter?: InterviewLogWriter;
  stateCache?: SessionStateCacheWriter;
}

export type TerminationReason = 'stop_command' | 'max_turns' | 'force_stop';

export type TurnResult =
  | { kind: 'reply'; message: string; turnId: number; difficulty: DifficultyLevel }
  | { kind: 'feedback'; reason: TerminationReason; message?: string; feedback: InterviewFeedback }
  | { kind: 'error'; message: string; agent?: AgentName; terminated: boolean }
  | { kind: 'cancelled' };

export interface SessionStatus {
  sessionId: string;
  phase: SessionPhase;
  turnCounter: number;
  maxTurns: number;
  difficulty: DifficultyLevel;
  cancelled: boolean;
  feedbackReady: boolean;
  feedbackPending: boolean;
}

class PipelineCancelled extends Error {
  constructor(stage: string) {
    super(`Cancelled after ${stage}`);
    this.name = 'PipelineCancelled';
  }
}

const GOOD_QUALITIES = new Set(['good', 'excellent']);

/**
 * Runs one interview session: greeting, the per-message pipeline and the final
 * evaluation. State only advances at the commit stage; any earlier failure
 * leaves the open turn in place so the same message can be sent again.
 */
export class InterviewOrchestrator {
  private readonly state: InterviewState;
  private phase: SessionPhase = 'created';
  private feedback: InterviewFeedback | null = null;
  private cancelRequested = false;
  private cancelled = false;
  private running = false;
  private evaluating = false;
  private logsWritten = false;

  constructor(
    readonly sessionId: string,
    readonly config: InterviewConfig,
    private readonly deps: OrchestratorDependencies
  ) {
    this.state = createInitialState(config.jobDescription);
  }

  get currentPhase(): SessionPhase {
    return this.phase;
  }

  get finalFeedback(): InterviewFeedback | null {
    return this.feedback;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get view(): ReadonlyInterviewState {
    return this.state;
  }

  get status(): SessionStatus {
    return {
      sessionId: this.sessionId,
      phase: this.phase,
      turnCounter: this.state.turnCounter,
      maxTurns: this.config.maxTurns,
      difficulty: this.state.currentDifficulty,
      cancelled: this.cancelled,
      feedbackReady: this.feedback !== null,
      feedbackPending: this.phase === 'terminated' && !this.cancelled && this.feedback === null,
    };
  }

  async start(): Promise<string> {
    if (this.phase !== 'created') {
      throw new InvalidStateError(`Session ${this.sessionId} was already started`);
    }

    this.deps.telemetry.startTrace({
      model: this.config.model,
      maxTurns: this.config.maxTurns,
      hasJobDescription: Boolean(this.config.jobDescription),
    });

    // A cancel that lands while the greeting is generated is applied once it returns.
    let greeting: string;
    this.running = true;
    this.cancelRequested = false;
    try {
      greeting = await this.deps.interviewer.generateGreeting(this.state);
    } finally {
      this.running = false;
      if (this.cancelRequested) await this.terminateCancelled('Cancelled during greeting');
    }
    if (this.cancelled) {
      throw new InvalidStateError(`Session ${this.sessionId} was cancelled during start`);
    }

    this.openTurn(greeting);
    this.phase = 'active';
    this.deps.telemetry.addSpan('greeting', { length: greeting.length });
    console.log(`[Orchestrator] ${this.sessionId} started (model ${this.config.model})`);

    await this.saveSnapshot();
    return greeting;
  }

  async processMessage(text: string): Promise<TurnResult> {
    if (this.phase !== 'active') {
      throw new InvalidStateError(`Session ${this.sessionId} is ${this.phase}, cannot accept messages`);
    }

    const turn = this.currentTurn();
    this.running = true;
    this.cancelRequested = false;
    let snapshot: DifficultySnapshot | undefined;

    try {
      // 1. record
      turn.candidateMessage = text;
      this.checkpoint('record');

      // 2. classify
      let analysis: ObserverAnalysis;
      try {
        analysis = await this.deps.observer.analyze(this.state, text, turn.agentMessage);
      } catch (error) {
        return this.failure('observer', error);
      }
      this.deps.telemetry.addSpan('observer', {
        turnId: turn.turnId,
        responseType: analysis.responseType,
        quality: analysis.quality,
        answeredLastQuestion: analysis.answeredLastQuestion,
      });
      this.checkpoint('observer');

      // 3. merge
      const merged = mergeCandidateInfo(this.state.candidate, analysis.extractedInfo);
      this.state.candidate = merged.candidate;
      if (merged.gradeAssigned) {
        this.state.currentDifficulty = initialDifficultyFor(merged.gradeAssigned);
        console.log(
          `[Orchestrator] ${this.sessionId} grade ${merged.gradeAssigned} → difficulty ${this.state.currentDifficulty}`
        );
      }
      this.checkpoint('merge');

      // 4. stop
      if (analysis.responseType === 'stop_command') {
        this.closeTurn(turn, analysis, analysis.thoughts);
        this.phase = 'terminated';
        this.deps.telemetry.addSpan('stop_command', { turnId: turn.turnId });
        console.log(`[Orchestrator] ${this.sessionId} stopped by candidate on turn ${turn.turnId}`);
        return await this.finish('stop_command');
      }

      // 5. difficulty
      snapshot = {
        difficulty: this.state.currentDifficulty,
        goodStreak: this.state.consecutiveGoodAnswers,
        badStreak: this.state.consecutiveBadAnswers,
      };
      if (analysis.answeredLastQuestion) {
        this.applyDifficulty(adjustDifficulty(snapshot, analysis));
        this.deps.telemetry.addSpan('difficulty', { from: snapshot.difficulty, to: this.state.currentDifficulty });
      }
      this.checkpoint('difficulty');

      // 6. reply
      let reply: InterviewerReply;
      try {
        reply = await this.deps.interviewer.respond(this.state, analysis, text);
      } catch (error) {
        this.applyDifficulty(snapshot);
        return this.failure('interviewer', error);
      }
      this.deps.telemetry.addSpan('interviewer', { turnId: turn.turnId, length: reply.reply.length });
      this.checkpoint('interviewer');

      // 7. commit
      this.commit(turn, analysis, reply.thoughts);
      this.openTurn(reply.reply);

      if (this.state.turnCounter >= this.config.maxTurns) {
        this.phase = 'terminated';
        console.log(`[Orchestrator] ${this.sessionId} reached ${this.config.maxTurns} turns`);
        return await this.finish('max_turns', reply.reply);
      }

      await this.saveSnapshot();
      return {
        kind: 'reply',
        message: reply.reply,
        turnId: turn.turnId,
        difficulty: this.state.currentDifficulty,
      };
    } catch (error) {
      if (!(error instanceof PipelineCancelled)) throw error;

      if (snapshot) this.applyDifficulty(snapshot);
      await this.terminateCancelled(error.message);
      return { kind: 'cancelled' };
    } finally {
      this.running = false;
    }
  }

  /**
   * Takes effect at the next stage boundary of a running pipeline, or at once
   * when the session is idle.
   */
  async requestCancel(): Promise<void> {
    if (this.phase === 'terminated') return;

    if (this.running) {
      this.cancelRequested = true;
      return;
    }
    await this.terminateCancelled('Cancelled while idle');
  }

  /** Ends the session and returns its feedback, evaluating if still pending. */
  async forceStop(): Promise<InterviewFeedback> {
    if (this.feedback) return this.feedback;
    if (this.phase === 'created') {
      throw new InvalidStateError(`Session ${this.sessionId} has not started`);
    }
    if (this.cancelled) {
      throw new InvalidStateError(`Session ${this.sessionId} was cancelled`);
    }

    return this.generateFeedback();
  }

  /**
   * Evaluates an active session, or retries a terminated one whose evaluation failed.
   * Cancelled sessions never get feedback.
   */
  async generateFeedback(): Promise<InterviewFeedback> {
    if (this.phase === 'created') {
      throw new InvalidStateError(`Session ${this.sessionId} has not started`);
    }
    if (this.cancelled) {
      throw new InvalidStateError(`Session ${this.sessionId} was cancelled`);
    }
    if (this.feedback) {
      throw new InvalidStateError(`Feedback for session ${this.sessionId} was already generated`);
    }
    if (this.evaluating) {
      throw new InvalidStateError(`Feedback for session ${this.sessionId} is being generated`);
    }

    this.phase = 'terminated';
    this.evaluating = true;
    let feedback: InterviewFeedback;
    try {
      feedback = deepFreeze(await this.deps.evaluator.evaluate(this.state));
    } finally {
      this.evaluating = false;
    }
    this.feedback = feedback;
    this.deps.telemetry.addSpan('evaluator', {
      grade: feedback.verdict.grade,
      recommendation: feedback.verdict.hiringRecommendation,
    });

    const metrics = this.deps.telemetry.finalize();
    await this.writeLogs(metrics);
    await this.saveSnapshot();

    console.log(`[Orchestrator] ${this.sessionId} evaluated: ${feedback.verdict.grade}`);
    return feedback;
  }

  /** Closes the trace of a session that is being dropped without finishing it. */
  release(): void {
    this.deps.telemetry.finalize();
  }

  private async finish(reason: TerminationReason, message?: string): Promise<TurnResult> {
    try {
      const feedback = await this.generateFeedback();
      return { kind: 'feedback', reason, message, feedback };
    } catch (error) {
      await this.saveSnapshot();
      return this.failure('evaluator', error);
    }
  }

  private failure(stage: string, error: unknown): TurnResult {
    const agent = error instanceof AgentError ? error.agent : undefined;
    console.error(`[Orchestrator] ${this.sessionId} ${stage} failed: ${describeError(error)}`);
    this.deps.telemetry.addSpan(`${stage}_error`, { error: describeError(error) });

    return {
      kind: 'error',
      message: describeError(error),
      agent,
      terminated: this.phase === 'terminated',
    };
  }

  private checkpoint(stage: string): void {
    if (this.cancelRequested) {
      throw new PipelineCancelled(stage);
    }
  }

  private async terminateCancelled(reason: string): Promise<void> {
    this.phase = 'terminated';
    this.cancelled = true;
    this.cancelRequested = false;
    this.deps.telemetry.addSpan('cancelled', { reason });
    this.deps.telemetry.finalize();
    console.log(`[Orchestrator] ${this.sessionId} cancelled: ${reason}`);
    await this.saveSnapshot();
  }

  private applyDifficulty(snapshot: DifficultySnapshot): void {
    this.state.currentDifficulty = snapshot.difficulty;
    this.state.consecutiveGoodAnswers = snapshot.goodStreak;
    this.state.consecutiveBadAnswers = snapshot.badStreak;
  }

  private commit(turn: InterviewTurn, analysis: ObserverAnalysis, thoughts: InterviewTurn['thoughts']): void {
    const topics = analysis.detectedTopics;
    this.state.coveredTopics = union(this.state.coveredTopics, topics);

    if (analysis.answeredLastQuestion) {
      if (GOOD_QUALITIES.has(analysis.quality) && analysis.isFactuallyCorrect) {
        this.state.confirmedSkills = union(this.state.confirmedSkills, topics);
      }

      const isGap =
        analysis.responseType === 'hallucination' || !analysis.isFactuallyCorrect || analysis.quality === 'wrong';
      if (isGap) {
        this.recordGaps(turn, analysis);
      }
    }

    this.state.turnCounter += 1;
    this.deps.telemetry.incrementTurn();
    this.closeTurn(turn, analysis, thoughts);
  }

  private recordGaps(turn: InterviewTurn, analysis: ObserverAnalysis): void {
    const topics = analysis.detectedTopics.length ? analysis.detectedTopics : [`Turn ${turn.turnId}`];
    const known = new Set(this.state.knowledgeGaps.map((gap) => gap.topic.toLowerCase()));

    for (const topic of topics) {
      if (known.has(topic.toLowerCase())) continue;
      known.add(topic.toLowerCase());

      const gap: KnowledgeGap = { topic, note: `Answer classified as ${analysis.responseType} (${analysis.quality})` };
      if (analysis.correctAnswer) gap.correctAnswer = analysis.correctAnswer;
      this.state.knowledgeGaps.push(gap);
    }
  }

  private closeTurn(turn: InterviewTurn, analysis: ObserverAnalysis, thoughts: InterviewTurn['thoughts']): void {
    turn.thoughts = [...turn.thoughts, ...thoughts];
    turn.classification = {
      responseType: analysis.responseType,
      isFactuallyCorrect: analysis.isFactuallyCorrect,
      detectedTopics: [...analysis.detectedTopics],
      correctAnswer: analysis.correctAnswer,
    };
    turn.closed = true;
  }

  private openTurn(agentMessage: string): void {
    this.state.turns.push({
      turnId: this.state.turns.length + 1,
      agentMessage,
      thoughts: [],
      closed: false,
      createdAt: new Date(),
    });
  }

  private currentTurn(): InterviewTurn {
    const turn = this.state.turns[this.state.turns.length - 1];
    if (!turn || turn.closed) {
      throw new InvalidStateError(`Session ${this.sessionId} has no open turn`);
    }
    return turn;
  }

  private async writeLogs(metrics: ReturnType<SessionTelemetry['finalize']>): Promise<void> {
    const writer = this.deps.logWriter;
    if (!writer || this.logsWritten) return;
    this.logsWritten = true;

    try {
      await writer.saveCompactLog(this.sessionId, buildCompactLog(this.state, this.feedback));
      await writer.saveDetailedLog(this.sessionId, buildDetailedLog(this.state, this.feedback, metrics));
    } catch (error) {
      console.error(`[Orchestrator] ${this.sessionId} failed to persist logs: ${describeError(error)}`);
    }
  }

  private async saveSnapshot(): Promise<void> {
    const cache = this.deps.stateCache;
    if (!cache) return;

    try {
      await cache.save({
        sessionId: this.sessionId,
        phase: this.phase,
        state: this.state,
        feedback: this.feedback,
      });
    } catch (error) {
      console.warn(`[Orchestrator] ${this.sessionId} snapshot not cached: ${describeError(error)}`);
    }
  }
}

const union = (current: readonly string[], incoming: readonly string[]): string[] => {
  const result = [...current];
  const seen = new Set(result.map((item) => item.toLowerCase()));
  for (const item of incoming) {
    if (!seen.has(item.toLowerCase())) {
      seen.add(item.toLowerCase());
      result.push(item);
    }
  }
  return result;
};
