import axios, { AxiosInstance } from 'axios';
import { v4 as uuidv4 } from 'uuid';
import { TokenUsage } from '../../models/types';
import { langfuseConfig } from '../../config/services';
import { AggregateMetrics, ObservabilityCollaborator, SpanAttributes } from './types';

export interface LangfuseSettings {
  host: string;
  publicKey: string;
  secretKey: string;
}

type IngestionEventType = 'trace-create' | 'span-create' | 'generation-create';

type IngestionClient = Pick<AxiosInstance, 'post'>;

const INGESTION_PATH = '/api/public/ingestion';

/**
 * Sends traces, spans and generations to Langfuse through its public ingestion API.
 * One trace per interview session.
 */
export class LangfuseTracker implements ObservabilityCollaborator {
  private client: IngestionClient;
  private traceIds = new Map<string, string>();

  constructor(settings: LangfuseSettings, client?: IngestionClient) {
    this.client =
      client ??
      axios.create({
        baseURL: settings.host,
        auth: { username: settings.publicKey, password: settings.secretKey },
        headers: { 'Content-Type': 'application/json' },
        timeout: 10000,
      });
  }

  async startTrace(sessionId: string, metadata: SpanAttributes = {}): Promise<void> {
    await this.send('trace-create', {
      id: this.traceIdFor(sessionId),
      name: 'interview_session',
      sessionId,
      metadata,
    });
  }

  async addSpan(sessionId: string, name: string, attributes: SpanAttributes): Promise<void> {
    const now = new Date().toISOString();
    await this.send('span-create', {
      id: uuidv4(),
      traceId: this.traceIdFor(sessionId),
      name,
      startTime: now,
      endTime: now,
      metadata: attributes,
    });
  }

  async recordGeneration(sessionId: string, generationName: string, usage: TokenUsage): Promise<void> {
    await this.send('generation-create', {
      id: uuidv4(),
      traceId: this.traceIdFor(sessionId),
      name: generationName,
      usage: {
        input: usage.inputTokens,
        output: usage.outputTokens,
        total: usage.totalTokens,
        unit: 'TOKENS',
      },
    });
  }

  async finalizeTrace(sessionId: string, metrics: AggregateMetrics): Promise<void> {
    const traceId = this.traceIdFor(sessionId);
    this.traceIds.delete(sessionId);

    // Re-sending trace-create with the same id updates the trace.
    await this.send('trace-create', {
      id: traceId,
      sessionId,
      metadata: { token_metrics: metrics },
    });
  }

  private traceIdFor(sessionId: string): string {
    let traceId = this.traceIds.get(sessionId);
    if (!traceId) {
      traceId = uuidv4();
      this.traceIds.set(sessionId, traceId);
    }
    return traceId;
  }

  private async send(type: IngestionEventType, body: Record<string, unknown>): Promise<void> {
    await this.client.post(INGESTION_PATH, {
      batch: [{ id: uuidv4(), type, timestamp: new Date().toISOString(), body }],
    });
  }
}

/**
 * Used when Langfuse keys are not configured: spans only go to the debug log.
 */
export class ConsoleObservability implements ObservabilityCollaborator {
  startTrace(sessionId: string): void {
    console.debug(`[Trace] ${sessionId} started`);
  }

  addSpan(sessionId: string, name: string, attributes: SpanAttributes): void {
    console.debug(`[Trace] ${sessionId} ${name}`, attributes);
  }

  recordGeneration(sessionId: string, generationName: string, usage: TokenUsage): void {
    console.debug(`[Trace] ${sessionId} ${generationName} tokens=${usage.totalTokens}`);
  }

  finalizeTrace(sessionId: string, metrics: AggregateMetrics): void {
    console.debug(
      `[Trace] ${sessionId} finished: ${metrics.total.totalTokens} tokens over ${metrics.generationCount} generations`
    );
  }
}

export const createObservability = (): ObservabilityCollaborator => {
  if (langfuseConfig.enabled && langfuseConfig.publicKey && langfuseConfig.secretKey) {
    console.log(`✓ Langfuse tracing enabled (${langfuseConfig.host})`);
    return new LangfuseTracker(langfuseConfig);
  }
  return new ConsoleObservability();
};
