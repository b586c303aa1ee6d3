/**
 * Per-user conversation session storage
 *
 * Sessions are single-writer (one user drives their own conversation), so no
 * compare-and-swap is needed here. Idle sessions expire after `ttlMs`; they are
 * evicted when read, and every write sweeps out the rest.
 */
export interface SessionStore<T> {
  get(userId: string): T | null;
  set(userId: string, session: T): void;
  delete(userId: string): boolean;
}

export interface InMemorySessionStoreOptions {
  ttlMs: number;
  now?: () => number;
}

interface SessionEntry<T> {
  session: T;
  touchedAt: number;
}

export class InMemorySessionStore<T> implements SessionStore<T> {
  private sessions = new Map<string, SessionEntry<T>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: InMemorySessionStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  get(userId: string): T | null {
    const entry = this.sessions.get(userId);
    if (!entry) return null;

    if (this.now() - entry.touchedAt > this.ttlMs) {
      this.sessions.delete(userId);
      return null;
    }

    return entry.session;
  }

  set(userId: string, session: T): void {
    const now = this.now();
    this.sweep(now);
    this.sessions.set(userId, { session, touchedAt: now });
  }

  delete(userId: string): boolean {
    return this.sessions.delete(userId);
  }

  // Live and not-yet-swept sessions
  get size(): number {
    return this.sessions.size;
  }

  private sweep(now: number): void {
    for (const [userId, entry] of this.sessions) {
      if (now - entry.touchedAt > this.ttlMs) {
        this.sessions.delete(userId);
      }
    }
  }
}
