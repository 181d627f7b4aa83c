import { AgentName, ReadonlyInterviewState } from '../../models/types';
import {
  AgentError,
  CompletionError,
  ExtractionError,
  PayloadValidationError,
  describeError,
} from '../../utils/errors';
import { CompletionGateway } from '../llm/completionGateway';
import { ChatMessage, CompletionOptions, GenerationRecorder } from '../llm/types';
import { AgentConfig } from '../interview-orchestrator/interviewConfig';

export interface AgentContext {
  gateway: CompletionGateway;
  model: string;
  config: AgentConfig;
  recorder?: GenerationRecorder;
}

const OPENING_USER_MESSAGE = "Let's start the interview.";

const isRegenerable = (error: unknown): boolean =>
  error instanceof ExtractionError ||
  error instanceof PayloadValidationError ||
  (error instanceof CompletionError && (error.kind === 'empty_response' || error.kind === 'invalid_output'));

export abstract class BaseAgent {
  protected abstract readonly systemPrompt: string;

  constructor(
    readonly name: AgentName,
    protected readonly context: AgentContext
  ) {}

  get config(): AgentConfig {
    return this.context.config;
  }

  protected completionOptions(generationName: string, maxTokens = this.config.maxTokens): CompletionOptions {
    return {
      model: this.context.model,
      temperature: this.config.temperature,
      maxTokens,
      generationName,
      recorder: this.context.recorder,
    };
  }

  /**
   * System prompt, then the prior conversation, then `userContent`. A trailing
   * candidate message in the history is dropped since `userContent` carries it.
   */
  protected buildMessages(userContent: string, history: ChatMessage[] = []): ChatMessage[] {
    const messages: ChatMessage[] = [{ role: 'system', content: this.systemPrompt }];

    const filtered = history[history.length - 1]?.role === 'user' ? history.slice(0, -1) : history;
    if (filtered[0]?.role === 'assistant') {
      messages.push({ role: 'user', content: OPENING_USER_MESSAGE });
    }

    messages.push(...filtered, { role: 'user', content: userContent });
    return messages;
  }

  /**
   * Runs `produce` until it yields a usable result. Unusable output (no payload,
   * wrong shape, empty text) is re-generated up to `generationRetries` times;
   * gateway failures are final since the gateway already retried them.
   */
  protected async generate<T>(generationName: string, produce: () => Promise<T>): Promise<T> {
    const attempts = this.config.generationRetries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return await produce();
      } catch (error) {
        if (!isRegenerable(error)) {
          throw new AgentError(this.name, `${generationName} failed: ${describeError(error)}`, error);
        }

        lastError = error;
        console.warn(
          `[${this.name}] ${generationName} attempt ${attempt}/${attempts} unusable: ${describeError(error)}`
        );
      }
    }

    throw new AgentError(
      this.name,
      `${generationName} produced no usable output after ${attempts} attempt(s): ${describeError(lastError)}`,
      lastError
    );
  }

  protected static buildJobDescriptionBlock(jobDescription?: string): string {
    if (!jobDescription) return '';

    return [
      '',
      '## JOB DESCRIPTION',
      'The interview is for a specific opening. Adapt your work to its requirements.',
      '<job_description>',
      jobDescription,
      '</job_description>',
      '',
    ].join('\n');
  }

  protected static conversationHistory(state: ReadonlyInterviewState, windowTurns?: number): ChatMessage[] {
    const turns = windowTurns === undefined ? state.turns : state.turns.slice(-windowTurns);
    const history: ChatMessage[] = [];

    for (const turn of turns) {
      history.push({ role: 'assistant', content: turn.agentMessage });
      if (turn.candidateMessage) {
        history.push({ role: 'user', content: turn.candidateMessage });
      }
    }

    return history;
  }
}
