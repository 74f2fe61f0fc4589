import { randomUUID } from "crypto";

export interface Session {
  token: string;
  deviceId: string | null;
  isAdmin: boolean;
  expiresAt: number;
}

/**
 * In-memory bearer-token sessions for players and the admin.
 */
export class SessionStore {
  private sessions = new Map<string, Session>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  issue(deviceId: string | null, isAdmin: boolean): Session {
    const session: Session = {
      token: randomUUID(),
      deviceId,
      isAdmin,
      expiresAt: this.now() + this.ttlMs,
    };
    this.sessions.set(session.token, session);
    return session;
  }

  get(token: string): Session | null {
    const session = this.sessions.get(token);
    if (!session) return null;
    if (session.expiresAt <= this.now()) {
      this.sessions.delete(token);
      return null;
    }
    return session;
  }

  revoke(token: string): boolean {
    return this.sessions.delete(token);
  }

  /** Drop every session belonging to a device (kick). */
  revokeDevice(deviceId: string): number {
    let removed = 0;
    for (const [token, session] of this.sessions) {
      if (session.deviceId === deviceId) {
        this.sessions.delete(token);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }
}
