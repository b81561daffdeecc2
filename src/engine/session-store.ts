import { randomUUID } from 'node:crypto';

import { SessionNotFoundError } from '../lib/errors.js';
import type { SessionSummary } from '../lib/types.js';

import type { ChatSession } from './chat-session.js';
import { DEFAULT_MAX_SESSIONS, DEFAULT_SESSION_TTL_MS } from './config.js';
import { engineEvents } from './events.js';

const MIN_SWEEP_INTERVAL_MS = 10;
const MAX_SWEEP_INTERVAL_MS = 60_000;

export const SESSIONS_URI = 'toolstack://sessions';

export function sessionUri(sessionId: string): string {
  return `${SESSIONS_URI}/${sessionId}`;
}

function resolveSweepInterval(ttlMs: number): number {
  return Math.max(
    MIN_SWEEP_INTERVAL_MS,
    Math.min(MAX_SWEEP_INTERVAL_MS, ttlMs)
  );
}

export interface SessionStoreOptions {
  createSession: (id: string) => ChatSession;
  ttlMs?: number;
  maxSessions?: number;
}

/**
 * Holds independent chat sessions. Map order tracks activity, oldest first;
 * idle sessions expire after the TTL and the least recently used one is
 * evicted when capacity is reached.
 */
export class SessionStore {
  private readonly sessions = new Map<string, ChatSession>();
  private readonly createSession: (id: string) => ChatSession;
  private readonly ttlMs: number;
  private readonly maxSessions: number;
  private cleanupInterval: NodeJS.Timeout | undefined;

  constructor(options: SessionStoreOptions) {
    this.createSession = options.createSession;
    this.ttlMs = options.ttlMs ?? DEFAULT_SESSION_TTL_MS;
    this.maxSessions = options.maxSessions ?? DEFAULT_MAX_SESSIONS;
    this.ensureCleanupTimer();
  }

  ensureCleanupTimer(): void {
    if (this.cleanupInterval) {
      return;
    }
    this.cleanupInterval = setInterval(() => {
      this.sweep();
    }, resolveSweepInterval(this.ttlMs));
    this.cleanupInterval.unref();
  }

  dispose(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = undefined;
    }
    for (const id of [...this.sessions.keys()]) {
      this.remove(id);
    }
  }

  create(id: string = randomUUID()): ChatSession {
    if (this.sessions.has(id)) {
      throw new Error(`Session already exists: ${id}`);
    }
    this.evictIfAtCapacity();
    const session = this.createSession(id);
    this.sessions.set(id, session);
    engineEvents.emit('session:created', { sessionId: id });
    this.emitCollectionUpdated();
    return session;
  }

  get(id: string): ChatSession | undefined {
    return this.sessions.get(id);
  }

  getOrThrow(id: string): ChatSession {
    const session = this.sessions.get(id);
    if (!session) {
      throw new SessionNotFoundError(id);
    }
    return session;
  }

  /** Marks the session as most recently used and announces its new state. */
  touch(id: string): void {
    const session = this.sessions.get(id);
    if (!session) {
      return;
    }
    this.sessions.delete(id);
    this.sessions.set(id, session);
    engineEvents.emit('resource:updated', { uri: sessionUri(id) });
    engineEvents.emit('resource:updated', { uri: SESSIONS_URI });
  }

  get size(): number {
    return this.sessions.size;
  }

  getTtlMs(): number {
    return this.ttlMs;
  }

  getExpiresAt(id: string): number | undefined {
    const session = this.sessions.get(id);
    return session ? session.updatedAt + this.ttlMs : undefined;
  }

  /** Most recently used first. */
  listSessionIds(): string[] {
    return [...this.sessions.keys()].reverse();
  }

  listSummaries(): SessionSummary[] {
    return [...this.sessions.values()]
      .reverse()
      .map((session) => session.summary());
  }

  /** Expires sessions idle for longer than the TTL. Busy sessions are kept. */
  sweep(now: number = Date.now()): number {
    let expired = 0;
    for (const [id, session] of [...this.sessions]) {
      if (session.busy || session.updatedAt + this.ttlMs >= now) {
        continue;
      }
      this.remove(id);
      engineEvents.emit('session:expired', { sessionId: id });
      expired++;
    }
    if (expired > 0) {
      this.emitCollectionUpdated();
    }
    return expired;
  }

  /**
   * Evicts idle sessions, least recently used first. Busy sessions are never
   * evicted, so the store may briefly hold more than `maxSessions`.
   */
  private evictIfAtCapacity(): void {
    while (this.sessions.size >= this.maxSessions) {
      const victim = this.findEvictionCandidate();
      if (victim === undefined) {
        break;
      }
      this.remove(victim);
      engineEvents.emit('session:evicted', {
        sessionId: victim,
        reason: 'max_sessions',
      });
      this.emitCollectionUpdated();
    }
  }

  private findEvictionCandidate(): string | undefined {
    for (const [id, session] of this.sessions) {
      if (!session.busy) {
        return id;
      }
    }
    return undefined;
  }

  private remove(id: string): boolean {
    const session = this.sessions.get(id);
    if (!session) {
      return false;
    }
    this.sessions.delete(id);
    session.cancel();
    return true;
  }

  private emitCollectionUpdated(): void {
    engineEvents.emit('resources:changed', { uri: SESSIONS_URI });
    engineEvents.emit('resource:updated', { uri: SESSIONS_URI });
  }
}
