import { ConfigValidationError } from '../../utils/errors';

export interface AgentConfig {
  temperature: number;
  maxTokens: number;
  /** Bounded re-generations after an unusable completion. */
  generationRetries: number;
}

export interface AgentSettings {
  observer: AgentConfig;
  interviewer: AgentConfig;
  evaluator: AgentConfig;
}

export interface InterviewConfig {
  model: string;
  maxTurns: number;
  jobDescription?: string;
  agents: AgentSettings;
}

export interface InterviewConfigInput {
  model?: string;
  maxTurns?: number;
  jobDescription?: string;
  agents?: Partial<Record<keyof AgentSettings, Partial<AgentConfig>>>;
}

export interface ConfigDefaults {
  model: string;
  maxTurns: number;
  agents: AgentSettings;
}

const checkRange = (field: string, value: number, min: number, max: number, integer: boolean): number => {
  if (!Number.isFinite(value) || value < min || value > max || (integer && !Number.isInteger(value))) {
    throw new ConfigValidationError(
      `${field} must be ${integer ? 'an integer' : 'a number'} between ${min} and ${max}, got ${value}`
    );
  }
  return value;
};

const blankToUndefined = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const resolveAgent = (name: string, defaults: AgentConfig, input: Partial<AgentConfig> = {}): AgentConfig => ({
  temperature:
    Math.round(checkRange(`${name}.temperature`, input.temperature ?? defaults.temperature, 0, 2, false) * 100) / 100,
  maxTokens: checkRange(`${name}.maxTokens`, input.maxTokens ?? defaults.maxTokens, 64, 8192, true),
  generationRetries: checkRange(
    `${name}.generationRetries`,
    input.generationRetries ?? defaults.generationRetries,
    0,
    10,
    true
  ),
});

/**
 * Applies defaults and range checks to a session config coming from the caller.
 */
export const resolveInterviewConfig = (
  input: InterviewConfigInput,
  defaults: ConfigDefaults
): InterviewConfig => {
  const agents: AgentSettings = {
    observer: resolveAgent('observer', defaults.agents.observer, input.agents?.observer),
    interviewer: resolveAgent('interviewer', defaults.agents.interviewer, input.agents?.interviewer),
    evaluator: resolveAgent('evaluator', defaults.agents.evaluator, input.agents?.evaluator),
  };

  return {
    model: blankToUndefined(input.model) ?? defaults.model,
    maxTurns: checkRange('maxTurns', input.maxTurns ?? defaults.maxTurns, 1, 100, true),
    jobDescription: blankToUndefined(input.jobDescription),
    agents,
  };
};
