import { ExtractionError } from '../../utils/errors';

export type StructuredPayload = Record<string, unknown>;

const R_TAG_PATTERN = /<r\s*>([\s\S]*?)<\/r\s*>/i;
const RESULT_TAG_PATTERN = /<result\s*>([\s\S]*?)<\/result\s*>/i;
const JSON_FENCE_PATTERN = /```(?:json)?[ \t]*\r?\n?([\s\S]*?)```/i;
const REASONING_PATTERN = /<reasoning\s*>([\s\S]*?)<\/reasoning\s*>/i;
const REASONING_BLOCKS = /<reasoning\s*>[\s\S]*?<\/reasoning\s*>/gi;

const isPlainObject = (value: unknown): value is StructuredPayload =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const tryParseObject = (text: string): StructuredPayload | null => {
  const cleaned = text.trim();
  if (!cleaned) return null;

  try {
    const parsed: unknown = JSON.parse(cleaned);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
};

const fromPattern = (text: string, pattern: RegExp): StructuredPayload | null => {
  const match = pattern.exec(text);
  return match ? tryParseObject(match[1]) : null;
};

/**
 * Index one past the `}` that closes the object opened at `start`, or -1.
 * Braces inside string literals don't count.
 */
const findBalancedEnd = (text: string, start: number): number => {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return i + 1;
    }
  }

  return -1;
};

const fromBalancedBraces = (text: string): StructuredPayload | null => {
  let start = text.indexOf('{');

  while (start !== -1) {
    const end = findBalancedEnd(text, start);
    if (end !== -1) {
      const parsed = tryParseObject(text.slice(start, end));
      if (parsed) return parsed;
    }

    start = text.indexOf('{', start + 1);
  }

  return null;
};

/**
 * Recovers a JSON object from model output. Tiers, first hit wins:
 * `<r>` tags, `<result>` tags, a ```json fence, then the first balanced `{...}`.
 */
export const extractStructuredPayload = (text: string): StructuredPayload => {
  if (!text || !text.trim()) {
    throw new ExtractionError('Empty completion text');
  }

  const payload =
    fromPattern(text, R_TAG_PATTERN) ??
    fromPattern(text, RESULT_TAG_PATTERN) ??
    fromPattern(text, JSON_FENCE_PATTERN) ??
    fromBalancedBraces(text);

  if (!payload) {
    throw new ExtractionError(
      `No valid JSON object found in completion (length=${text.length}): ${text.slice(0, 300)}`
    );
  }

  return payload;
};

export const extractReasoning = (text: string): string | undefined => {
  const match = REASONING_PATTERN.exec(text);
  const reasoning = match?.[1].trim();
  return reasoning ? reasoning : undefined;
};

export const stripReasoning = (text: string): string => text.replace(REASONING_BLOCKS, '').trim();
