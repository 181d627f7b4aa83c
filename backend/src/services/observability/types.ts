import { TokenUsage } from '../../models/types';

export type SpanAttributes = Record<string, unknown>;

export interface AgentUsage extends TokenUsage {
  calls: number;
}

export interface AggregateMetrics {
  total: TokenUsage;
  generationCount: number;
  turnCount: number;
  avgTokensPerTurn: number;
  avgTokensPerGeneration: number;
  byAgent: {
    observer: AgentUsage;
    interviewer: AgentUsage;
    evaluator: AgentUsage;
  };
}

/**
 * Tracing backend. Calls are fire-and-forget from the pipeline's point of view;
 * returned promises are awaited only to log failures.
 */
export interface ObservabilityCollaborator {
  startTrace(sessionId: string, metadata?: SpanAttributes): void | Promise<void>;
  addSpan(sessionId: string, name: string, attributes: SpanAttributes): void | Promise<void>;
  recordGeneration(sessionId: string, generationName: string, usage: TokenUsage): void | Promise<void>;
  finalizeTrace(sessionId: string, metrics: AggregateMetrics): void | Promise<void>;
}
