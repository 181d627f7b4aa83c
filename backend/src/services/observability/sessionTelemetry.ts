import { TokenUsage } from '../../models/types';
import { describeError } from '../../utils/errors';
import { GenerationRecorder } from '../llm/types';
import { SessionMetrics } from './sessionMetrics';
import { AggregateMetrics, ObservabilityCollaborator, SpanAttributes } from './types';

/**
 * Binds an observability collaborator to one session and keeps its token metrics.
 * A failing collaborator is logged and otherwise ignored.
 */
export class SessionTelemetry implements GenerationRecorder {
  readonly metrics = new SessionMetrics();
  private finalized = false;

  constructor(
    private readonly sessionId: string,
    private readonly collaborator: ObservabilityCollaborator
  ) {}

  startTrace(metadata?: SpanAttributes): void {
    this.dispatch('startTrace', () => this.collaborator.startTrace(this.sessionId, metadata));
  }

  addSpan(name: string, attributes: SpanAttributes = {}): void {
    this.dispatch(`addSpan(${name})`, () => this.collaborator.addSpan(this.sessionId, name, attributes));
  }

  recordGeneration(generationName: string, usage: TokenUsage): void {
    this.metrics.addGeneration(generationName, usage);
    this.dispatch('recordGeneration', () =>
      this.collaborator.recordGeneration(this.sessionId, generationName, usage)
    );
  }

  incrementTurn(): void {
    this.metrics.incrementTurn();
  }

  /** Closes the trace once; later calls only return the current metrics. */
  finalize(): AggregateMetrics {
    const metrics = this.metrics.snapshot();
    if (this.finalized) return metrics;

    this.finalized = true;
    this.dispatch('finalizeTrace', () => this.collaborator.finalizeTrace(this.sessionId, metrics));
    return metrics;
  }

  private dispatch(operation: string, call: () => void | Promise<void>): void {
    const warn = (error: unknown) =>
      console.warn(`[Telemetry] ${operation} failed for session ${this.sessionId}: ${describeError(error)}`);

    try {
      void Promise.resolve(call()).catch(warn);
    } catch (error) {
      warn(error);
    }
  }
}
