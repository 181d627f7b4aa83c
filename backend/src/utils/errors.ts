import { AgentName } from '../models/types';

export type CompletionErrorKind =
  | 'rate_limited'
  | 'server_error'
  | 'timeout'
  | 'connection'
  | 'client_error'
  | 'structured_output_unsupported'
  | 'invalid_output'
  | 'empty_response';

const TRANSIENT_KINDS: ReadonlySet<CompletionErrorKind> = new Set<CompletionErrorKind>([
  'rate_limited',
  'server_error',
  'timeout',
  'connection',
]);

/**
 * Raised by a completion backend or by the gateway once retries are exhausted.
 */
export class CompletionError extends Error {
  readonly kind: CompletionErrorKind;
  readonly status?: number;

  constructor(kind: CompletionErrorKind, message: string, status?: number) {
    super(message);
    this.name = 'CompletionError';
    this.kind = kind;
    this.status = status;
  }

  get isTransient(): boolean {
    return TRANSIENT_KINDS.has(this.kind);
  }
}

/**
 * No structured payload could be recovered from generated text.
 */
export class ExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExtractionError';
  }
}

/**
 * A payload was recovered but does not match the agent's contract.
 */
export class PayloadValidationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.name = 'PayloadValidationError';
    this.field = field;
  }
}

export class AgentError extends Error {
  readonly agent: AgentName;

  constructor(agent: AgentName, message: string, cause?: unknown) {
    super(`${agent}: ${message}`, { cause });
    this.name = 'AgentError';
    this.agent = agent;
  }
}

export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidStateError';
  }
}

export class SessionNotFoundError extends Error {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`);
    this.name = 'SessionNotFoundError';
    this.sessionId = sessionId;
  }
}

export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? `${error.name}: ${error.message}` : String(error);
