import dotenv from 'dotenv';
dotenv.config();

const intFromEnv = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (!raw) return fallback;

  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    console.warn(`⚠️  ${name}=${raw} is not a number, using ${fallback}`);
    return fallback;
  }
  return parsed;
};

export const groqConfig = {
  apiKey: process.env.GROQ_API_KEY || '',
};

export const llmConfig = {
  model: process.env.LLM_MODEL || 'llama-3.3-70b-versatile',
  timeoutMs: intFromEnv('LLM_TIMEOUT_MS', 120000),
  maxRetries: intFromEnv('LLM_MAX_RETRIES', 3),
  backoffBaseMs: intFromEnv('LLM_BACKOFF_BASE_MS', 500),
  backoffMaxMs: intFromEnv('LLM_BACKOFF_MAX_MS', 30000),
};

export const interviewSettings = {
  maxTurns: intFromEnv('MAX_TURNS', 20),
  historyWindowTurns: intFromEnv('HISTORY_WINDOW_TURNS', 10),
  greetingMaxTokens: intFromEnv('GREETING_MAX_TOKENS', 300),
};

export const agentDefaults = {
  observer: { temperature: 0.3, maxTokens: 1000, generationRetries: 2 },
  interviewer: { temperature: 0.7, maxTokens: 800, generationRetries: 0 },
  evaluator: { temperature: 0.3, maxTokens: 3000, generationRetries: 2 },
};

export const langfuseConfig = {
  enabled: process.env.LANGFUSE_ENABLED !== 'false',
  publicKey: process.env.LANGFUSE_PUBLIC_KEY || '',
  secretKey: process.env.LANGFUSE_SECRET_KEY || '',
  host: (process.env.LANGFUSE_HOST || 'http://localhost:3001').replace(/\/+$/, ''),
};

// Validate configuration
if (!groqConfig.apiKey) {
  console.warn('⚠️  Groq API key is missing. Interview agents will fail.');
}

if (langfuseConfig.enabled && (!langfuseConfig.publicKey || !langfuseConfig.secretKey)) {
  console.warn('⚠️  Langfuse keys are missing. Traces will only be written to the debug log.');
}

if (llmConfig.maxRetries < 0) {
  console.warn('⚠️  LLM_MAX_RETRIES must be >= 0, using 0.');
  llmConfig.maxRetries = 0;
}
