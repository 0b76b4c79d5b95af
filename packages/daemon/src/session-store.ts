import type { Session, SessionStatus } from "./types.js";

/**
 * In-memory map of session id → last-known session.
 *
 * The map is swapped wholesale on every write, so a snapshot handed out
 * earlier never changes underneath its reader.
 */
export class SessionStore {
  private sessions: ReadonlyMap<string, Session> = new Map();

  get size(): number {
    return this.sessions.size;
  }

  replace(next: ReadonlyMap<string, Session>): void {
    this.sessions = new Map(next);
  }

  snapshot(): ReadonlyMap<string, Session> {
    return this.sessions;
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  statuses(): Map<string, SessionStatus> {
    const result = new Map<string, SessionStatus>();
    for (const [id, session] of this.sessions) {
      result.set(id, session.status);
    }
    return result;
  }

  /**
   * Drop sessions not seen within the timeout. Returns the evicted ids.
   */
  evictExpired(now: Date, timeoutSeconds: number): string[] {
    const evicted: string[] = [];
    const kept = new Map<string, Session>();
    for (const [id, session] of this.sessions) {
      if (isExpired(session.lastSeen, now, timeoutSeconds)) {
        evicted.push(id);
      } else {
        kept.set(id, session);
      }
    }
    if (evicted.length > 0) this.sessions = kept;
    return evicted;
  }
}

export function isExpired(lastSeen: Date, now: Date, timeoutSeconds: number): boolean {
  return now.getTime() - lastSeen.getTime() >= timeoutSeconds * 1000;
}
