import { Mutex } from 'async-mutex';
import { v4 as uuidv4 } from 'uuid';
import { InterviewFeedback, ReadonlyInterviewState } from '../../models/types';
import { SessionNotFoundError, describeError } from '../../utils/errors';
import { agentDefaults, groqConfig, interviewSettings, llmConfig } from '../../config/services';
import { InterviewLogWriter, interviewLogRepository } from '../../repositories/interviewLogRepository';
import {
  ACTIVE_TTL_SECONDS,
  SessionStateCacheWriter,
  TERMINATED_TTL_SECONDS,
  sessionStateCache,
} from '../../repositories/sessionStateCache';
import { EvaluatorAgent } from '../ai/evaluatorAgent';
import { InterviewerAgent, InterviewerOptions } from '../ai/interviewerAgent';
import { ObserverAgent } from '../ai/observerAgent';
import { EvaluatorDecision, InterviewerDecision, ObserverDecision } from '../ai/types';
import { CompletionGateway } from '../llm/completionGateway';
import { GroqCompletionBackend } from '../llm/groqBackend';
import { createObservability } from '../observability/langfuseTracker';
import { SessionTelemetry } from '../observability/sessionTelemetry';
import { ObservabilityCollaborator } from '../observability/types';
import { ConfigDefaults, InterviewConfig, InterviewConfigInput, resolveInterviewConfig } from './interviewConfig';
import { InterviewOrchestrator, SessionStatus, TurnResult } from './interviewOrchestrator';

export interface SessionAgents {
  observer: ObserverDecision;
  interviewer: InterviewerDecision;
  evaluator: EvaluatorDecision;
}

export type AgentFactory = (config: InterviewConfig, telemetry: SessionTelemetry) => SessionAgents;

export interface SessionManagerOptions {
  defaults: ConfigDefaults;
  agentFactory: AgentFactory;
  observability: ObservabilityCollaborator;
  logWriter?: InterviewLogWriter;
  stateCache?: SessionStateCacheWriter;
  idFactory?: () => string;
  /** Untouched sessions are cancelled and dropped after this long. */
  idleTtlMs?: number;
  /** Terminated sessions are dropped after this long; results then come from the snapshot cache. */
  terminatedTtlMs?: number;
}

export interface SessionStatusView extends SessionStatus {
  busy: boolean;
}

interface SessionEntry {
  orchestrator: InterviewOrchestrator;
  lock: Mutex;
  evictionTimer?: ReturnType<typeof setTimeout>;
}

/**
 * Registry of live sessions. Operations on one session run one at a time;
 * cancellation bypasses the lock so it can reach a running pipeline.
 */
export class SessionManager {
  private readonly sessions = new Map<string, SessionEntry>();

  constructor(private readonly options: SessionManagerOptions) {}

  get size(): number {
    return this.sessions.size;
  }

  create(input: InterviewConfigInput = {}): string {
    const config = resolveInterviewConfig(input, this.options.defaults);
    const sessionId = this.options.idFactory?.() ?? uuidv4();

    const telemetry = new SessionTelemetry(sessionId, this.options.observability);
    const orchestrator = new InterviewOrchestrator(sessionId, config, {
      ...this.options.agentFactory(config, telemetry),
      telemetry,
      logWriter: this.options.logWriter,
      stateCache: this.options.stateCache,
    });

    const entry: SessionEntry = { orchestrator, lock: new Mutex() };
    this.sessions.set(sessionId, entry);
    this.scheduleEviction(sessionId, entry);
    console.log(`📝 [SessionManager] Created session ${sessionId} (maxTurns ${config.maxTurns})`);
    return sessionId;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  async start(sessionId: string): Promise<string> {
    return this.runExclusive(sessionId, (orchestrator) => orchestrator.start());
  }

  async processMessage(sessionId: string, text: string): Promise<TurnResult> {
    return this.runExclusive(sessionId, (orchestrator) => orchestrator.processMessage(text));
  }

  async forceStop(sessionId: string): Promise<InterviewFeedback> {
    return this.runExclusive(sessionId, (orchestrator) => orchestrator.forceStop());
  }

  async cancel(sessionId: string): Promise<void> {
    const entry = this.entry(sessionId);
    await entry.orchestrator.requestCancel();
    this.scheduleEviction(sessionId, entry);
  }

  getStatus(sessionId: string): SessionStatusView {
    const { orchestrator, lock } = this.entry(sessionId);
    return { ...orchestrator.status, busy: lock.isLocked() };
  }

  getFeedback(sessionId: string): InterviewFeedback | null {
    return this.entry(sessionId).orchestrator.finalFeedback;
  }

  getState(sessionId: string): ReadonlyInterviewState {
    return this.entry(sessionId).orchestrator.view;
  }

  async close(sessionId: string): Promise<boolean> {
    const entry = this.sessions.get(sessionId);
    if (!entry) return false;

    clearTimeout(entry.evictionTimer);
    this.sessions.delete(sessionId);
    await entry.orchestrator.requestCancel();
    entry.orchestrator.release();
    console.log(`🗑️  [SessionManager] Closed session ${sessionId}`);
    return true;
  }

  private async runExclusive<T>(
    sessionId: string,
    operation: (orchestrator: InterviewOrchestrator) => Promise<T>
  ): Promise<T> {
    const entry = this.entry(sessionId);
    try {
      return await entry.lock.runExclusive(() => operation(entry.orchestrator));
    } finally {
      this.scheduleEviction(sessionId, entry);
    }
  }

  private scheduleEviction(sessionId: string, entry: SessionEntry): void {
    if (this.sessions.get(sessionId) !== entry) return;

    clearTimeout(entry.evictionTimer);
    const terminated = entry.orchestrator.currentPhase === 'terminated';
    const delay = terminated
      ? this.options.terminatedTtlMs ?? TERMINATED_TTL_SECONDS * 1000
      : this.options.idleTtlMs ?? ACTIVE_TTL_SECONDS * 1000;

    entry.evictionTimer = setTimeout(() => this.evict(sessionId, entry), delay);
    entry.evictionTimer.unref?.();
  }

  private evict(sessionId: string, entry: SessionEntry): void {
    if (entry.lock.isLocked()) {
      this.scheduleEviction(sessionId, entry);
      return;
    }

    console.log(`⏱️  [SessionManager] Evicting session ${sessionId} (${entry.orchestrator.currentPhase})`);
    void this.close(sessionId).catch((error) =>
      console.error(`❌ [SessionManager] Failed to evict ${sessionId}: ${describeError(error)}`)
    );
  }

  private entry(sessionId: string): SessionEntry {
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      throw new SessionNotFoundError(sessionId);
    }
    return entry;
  }
}

export const createDefaultAgentFactory = (
  gateway: CompletionGateway,
  interviewerOptions: InterviewerOptions
): AgentFactory => (config, telemetry) => ({
  observer: new ObserverAgent({ gateway, model: config.model, config: config.agents.observer, recorder: telemetry }),
  interviewer: new InterviewerAgent(
    { gateway, model: config.model, config: config.agents.interviewer, recorder: telemetry },
    interviewerOptions
  ),
  evaluator: new EvaluatorAgent({ gateway, model: config.model, config: config.agents.evaluator, recorder: telemetry }),
});

export const createSessionManager = (): SessionManager => {
  const gateway = new CompletionGateway(new GroqCompletionBackend(groqConfig.apiKey), {
    maxRetries: llmConfig.maxRetries,
    backoffBaseMs: llmConfig.backoffBaseMs,
    backoffMaxMs: llmConfig.backoffMaxMs,
    timeoutMs: llmConfig.timeoutMs,
  });

  return new SessionManager({
    defaults: {
      model: llmConfig.model,
      maxTurns: interviewSettings.maxTurns,
      agents: agentDefaults,
    },
    agentFactory: createDefaultAgentFactory(gateway, {
      historyWindowTurns: interviewSettings.historyWindowTurns,
      greetingMaxTokens: interviewSettings.greetingMaxTokens,
    }),
    observability: createObservability(),
    logWriter: interviewLogRepository,
    stateCache: sessionStateCache,
  });
};
