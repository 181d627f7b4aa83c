import { CompletionError, describeError } from '../../utils/errors';
import { extractReasoning, extractStructuredPayload } from './responseExtractor';
import {
  BackendResponse,
  ChatMessage,
  CompletionBackend,
  CompletionOptions,
  CompletionResult,
  StructuredCompletion,
} from './types';

export interface GatewaySettings {
  maxRetries: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  timeoutMs: number;
}

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Retrying front for a `CompletionBackend`.
 *
 * Transient failures are retried with exponential backoff capped at
 * `backoffMaxMs`; anything else surfaces immediately. Models that reject JSON
 * mode are remembered for the life of the process and served in plain-text
 * mode with local extraction from then on.
 */
export class CompletionGateway {
  private readonly structuredOutputSupport = new Map<string, boolean>();

  constructor(
    private readonly backend: CompletionBackend,
    private readonly settings: GatewaySettings,
    private readonly sleep: Sleep = defaultSleep
  ) {}

  supportsStructuredOutput(model: string): boolean {
    return this.structuredOutputSupport.get(model) ?? true;
  }

  computeRetryDelay(attempt: number): number {
    return Math.min(this.settings.backoffBaseMs * 2 ** attempt, this.settings.backoffMaxMs);
  }

  async complete(messages: ChatMessage[], options: CompletionOptions): Promise<CompletionResult> {
    const response = await this.request(messages, options, false);
    return { text: response.text, usage: response.usage };
  }

  async completeStructured(
    messages: ChatMessage[],
    options: CompletionOptions
  ): Promise<StructuredCompletion> {
    let response: BackendResponse | undefined;

    if (this.supportsStructuredOutput(options.model)) {
      try {
        response = await this.request(messages, options, true);
      } catch (error) {
        if (!(error instanceof CompletionError) || error.kind !== 'structured_output_unsupported') {
          throw error;
        }
        this.structuredOutputSupport.set(options.model, false);
        console.warn(
          `[CompletionGateway] JSON mode not supported by ${options.model}, using text mode from now on`
        );
      }
    }

    if (!response) {
      response = await this.request(messages, options, false);
    }

    return {
      text: response.text,
      usage: response.usage,
      payload: extractStructuredPayload(response.text),
      reasoning: extractReasoning(response.text),
    };
  }

  private async request(
    messages: ChatMessage[],
    options: CompletionOptions,
    jsonMode: boolean
  ): Promise<BackendResponse> {
    const attempts = this.settings.maxRetries + 1;
    let lastError: CompletionError | undefined;

    for (let attempt = 0; attempt < attempts; attempt++) {
      try {
        const response = await this.backend.createCompletion({
          model: options.model,
          messages,
          temperature: options.temperature,
          maxTokens: options.maxTokens,
          timeoutMs: options.timeoutMs ?? this.settings.timeoutMs,
          jsonMode,
        });

        this.reportUsage(options, response);
        return response;
      } catch (error) {
        const failure =
          error instanceof CompletionError
            ? error
            : new CompletionError('client_error', describeError(error));

        if (!failure.isTransient) {
          throw failure;
        }

        lastError = failure;
        console.warn(
          `[CompletionGateway] ${options.generationName} attempt ${attempt + 1}/${attempts} failed: ${failure.kind} ${failure.message}`
        );

        if (attempt < attempts - 1) {
          await this.sleep(this.computeRetryDelay(attempt));
        }
      }
    }

    throw new CompletionError(
      lastError?.kind ?? 'server_error',
      `Max retries (${this.settings.maxRetries}) exceeded for ${options.generationName}: ${lastError?.message ?? 'unknown error'}`,
      lastError?.status
    );
  }

  private reportUsage(options: CompletionOptions, response: BackendResponse): void {
    if (!options.recorder) return;

    try {
      options.recorder.recordGeneration(options.generationName, response.usage);
    } catch (error) {
      console.warn(`[CompletionGateway] Failed to record usage: ${describeError(error)}`);
    }
  }
}
