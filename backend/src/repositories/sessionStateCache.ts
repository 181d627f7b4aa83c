import { getRedisClient } from '../config/redis';
import { InterviewFeedback, ReadonlyInterviewState } from '../models/types';
import { Payload, isRecord } from '../utils/payload';

export const ACTIVE_TTL_SECONDS = 3600;
export const TERMINATED_TTL_SECONDS = 300;

export type SessionPhase = 'created' | 'active' | 'terminated';

export interface SessionSnapshot {
  sessionId: string;
  phase: SessionPhase;
  state: ReadonlyInterviewState;
  feedback: InterviewFeedback | null;
}

/** Minimal key/value surface the cache needs; redis in production. */
export interface SnapshotStore {
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  get(key: string): Promise<string | null>;
}

export interface SessionStateCacheWriter {
  save(snapshot: SessionSnapshot): Promise<void>;
}

export const snapshotKey = (sessionId: string): string => `interview:${sessionId}`;

export const redisSnapshotStore = (): SnapshotStore => ({
  async set(key, value, ttlSeconds) {
    await getRedisClient().set(key, value, { EX: ttlSeconds });
  },
  async get(key) {
    const value = await getRedisClient().get(key);
    return typeof value === 'string' ? value : null;
  },
});

export class SessionStateCache implements SessionStateCacheWriter {
  constructor(private readonly store: SnapshotStore = redisSnapshotStore()) {}

  async save(snapshot: SessionSnapshot): Promise<void> {
    const ttl = snapshot.phase === 'terminated' ? TERMINATED_TTL_SECONDS : ACTIVE_TTL_SECONDS;
    const body = JSON.stringify({ ...snapshot, updatedAt: new Date().toISOString() });
    await this.store.set(snapshotKey(snapshot.sessionId), body, ttl);
  }

  /** Raw JSON snapshot as stored, or null when missing or unreadable. */
  async load(sessionId: string): Promise<Payload | null> {
    const raw = await this.store.get(snapshotKey(sessionId));
    if (!raw) return null;

    try {
      const parsed: unknown = JSON.parse(raw);
      return isRecord(parsed) ? parsed : null;
    } catch (error) {
      console.warn(`[SessionStateCache] Unreadable snapshot for ${sessionId}:`, error);
      return null;
    }
  }
}

export const sessionStateCache = new SessionStateCache();
