/**
 * Voice Session Store - in-memory mapping of session id to cloned voice id
 *
 * Each session remembers its own most recent clone; entries expire after a TTL.
 */

export interface VoiceSession {
  voiceId: string;
  createdAt: number;
  expiresAt: number;
}

export class VoiceSessionStore {
  private readonly sessions = new Map<string, VoiceSession>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  set(sessionId: string, voiceId: string): VoiceSession {
    const createdAt = this.now();
    const session = { voiceId, createdAt, expiresAt: createdAt + this.ttlMs };
    this.sessions.set(sessionId, session);
    return session;
  }

  get(sessionId: string): VoiceSession | undefined {
    const session = this.sessions.get(sessionId);
    if (session && session.expiresAt <= this.now()) {
      this.sessions.delete(sessionId);
      return undefined;
    }
    return session;
  }

  /**
   * Drop expired sessions, returning how many were removed
   */
  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [sessionId, session] of this.sessions.entries()) {
      if (session.expiresAt <= now) {
        this.sessions.delete(sessionId);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }
}
