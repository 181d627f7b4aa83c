import { TokenUsage } from '../../models/types';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface BackendRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  jsonMode: boolean;
}

export interface BackendResponse {
  text: string;
  usage: TokenUsage;
}

/**
 * Remote text-completion service. Implementations throw `CompletionError`
 * with a kind the gateway can classify as transient or permanent.
 */
export interface CompletionBackend {
  createCompletion(request: BackendRequest): Promise<BackendResponse>;
}

export interface GenerationRecorder {
  recordGeneration(generationName: string, usage: TokenUsage): void;
}

export interface CompletionOptions {
  model: string;
  temperature: number;
  maxTokens: number;
  generationName: string;
  timeoutMs?: number;
  recorder?: GenerationRecorder;
}

export interface CompletionResult {
  text: string;
  usage: TokenUsage;
}

export interface StructuredCompletion extends CompletionResult {
  payload: Record<string, unknown>;
  reasoning?: string;
}
