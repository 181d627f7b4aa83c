import Groq from 'groq-sdk';
import { CompletionError, CompletionErrorKind } from '../../utils/errors';
import { BackendRequest, BackendResponse, ChatMessage, CompletionBackend } from './types';

const JSON_MODE_REJECTION = /response_format|json_object|json mode/i;
// JSON mode was on but the model produced output that failed validation.
const JSON_VALIDATE_FAILED = /json_validate_failed|failed to generate json/i;

const toGroqMessage = (message: ChatMessage) => {
  switch (message.role) {
    case 'system':
      return { role: 'system' as const, content: message.content };
    case 'assistant':
      return { role: 'assistant' as const, content: message.content };
    default:
      return { role: 'user' as const, content: message.content };
  }
};

export const classifyStatus = (status: number | undefined, message: string): CompletionErrorKind => {
  if (status === 429) return 'rate_limited';
  if (status !== undefined && status >= 500) return 'server_error';
  if (status === 400 && JSON_VALIDATE_FAILED.test(message)) return 'invalid_output';
  if (status === 400 && JSON_MODE_REJECTION.test(message)) return 'structured_output_unsupported';
  return 'client_error';
};

export class GroqCompletionBackend implements CompletionBackend {
  private groq: Groq;

  constructor(apiKey: string) {
    // Retries are owned by CompletionGateway.
    this.groq = new Groq({ apiKey, maxRetries: 0 });
  }

  async createCompletion(request: BackendRequest): Promise<BackendResponse> {
    try {
      const completion = await this.groq.chat.completions.create(
        {
          messages: request.messages.map(toGroqMessage),
          model: request.model,
          temperature: request.temperature,
          max_tokens: request.maxTokens,
          ...(request.jsonMode ? { response_format: { type: 'json_object' as const } } : {}),
        },
        { timeout: request.timeoutMs }
      );

      const text = completion.choices[0]?.message?.content;
      if (!text) {
        throw new CompletionError('empty_response', 'No content in completion response');
      }

      return {
        text,
        usage: {
          inputTokens: completion.usage?.prompt_tokens ?? 0,
          outputTokens: completion.usage?.completion_tokens ?? 0,
          totalTokens: completion.usage?.total_tokens ?? 0,
        },
      };
    } catch (error) {
      throw this.toCompletionError(error);
    }
  }

  private toCompletionError(error: unknown): CompletionError {
    if (error instanceof CompletionError) return error;

    if (error instanceof Groq.APIConnectionTimeoutError) {
      return new CompletionError('timeout', error.message);
    }
    if (error instanceof Groq.APIConnectionError) {
      return new CompletionError('connection', error.message);
    }
    if (error instanceof Groq.APIError) {
      return new CompletionError(classifyStatus(error.status, error.message), error.message, error.status);
    }

    return new CompletionError('client_error', error instanceof Error ? error.message : String(error));
  }
}
