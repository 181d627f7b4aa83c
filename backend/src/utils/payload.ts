import { PayloadValidationError } from './errors';

export type Payload = Record<string, unknown>;

export const isRecord = (value: unknown): value is Payload =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Trimmed string, or undefined for anything blank or non-string. */
export const optionalString = (payload: Payload, key: string): string | undefined => {
  const value = payload[key];
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
};

export const stringOr = (payload: Payload, key: string, fallback: string): string =>
  optionalString(payload, key) ?? fallback;

export const optionalBoolean = (payload: Payload, key: string): boolean | undefined => {
  const value = payload[key];
  return typeof value === 'boolean' ? value : undefined;
};

export const booleanOr = (payload: Payload, key: string, fallback: boolean): boolean =>
  optionalBoolean(payload, key) ?? fallback;

export const optionalNumber = (payload: Payload, key: string): number | undefined => {
  const value = payload[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
};

export const stringList = (payload: Payload, key: string): string[] => {
  const value = payload[key];
  if (!Array.isArray(value)) return [];
  return value
    .filter((item): item is string => typeof item === 'string')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
};

export const optionalRecord = (payload: Payload, key: string): Payload | undefined => {
  const value = payload[key];
  return isRecord(value) ? value : undefined;
};

export const requireRecord = (payload: Payload, key: string): Payload => {
  const value = optionalRecord(payload, key);
  if (!value) {
    throw new PayloadValidationError(key, 'expected an object');
  }
  return value;
};

export const recordList = (payload: Payload, key: string): Payload[] => {
  const value = payload[key];
  return Array.isArray(value) ? value.filter(isRecord) : [];
};

export const matchEnum = <T extends string>(value: unknown, allowed: readonly T[]): T | undefined => {
  if (typeof value !== 'string') return undefined;
  const normalized = value.trim().toLowerCase();
  return allowed.find((option) => option.toLowerCase() === normalized);
};

export const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));
