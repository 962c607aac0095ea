import { createHmac, randomBytes } from "node:crypto";

export interface ActiveSession {
  readonly userId: string;
  /** Provider credential the user logged in with; handed to the assistant. */
  readonly credential: string;
  readonly createdAt: Date;
  readonly expiresAt: Date;
}

export interface IssuedSession {
  readonly token: string;
  readonly expiresAt: Date;
}

export interface SessionStoreOptions {
  readonly ttlMs: number;
  readonly secret: string;
  readonly now?: () => number;
}

/**
 * Process-local session table. Nothing survives a restart, so every user
 * logs in again after one.
 *
 * A session is valid while `now < expiresAt`; at the expiry instant it is
 * already gone. Lookups never extend the window.
 */
export class SessionStore {
  private readonly sessions = new Map<string, ActiveSession>();
  private readonly ttlMs: number;
  private readonly secret: string;
  private readonly now: () => number;
  private open = false;

  constructor(options: SessionStoreOptions) {
    if (!Number.isFinite(options.ttlMs) || options.ttlMs <= 0) {
      throw new Error(`session ttl must be positive: ${options.ttlMs}`);
    }
    this.ttlMs = options.ttlMs;
    this.secret = options.secret;
    this.now = options.now ?? Date.now;
  }

  init(): void {
    this.open = true;
  }

  get size(): number {
    return this.sessions.size;
  }

  create(userId: string, credential: string): IssuedSession {
    this.assertOpen();
    const token = randomBytes(32).toString("base64url");
    const createdAtMs = this.now();
    const expiresAt = new Date(createdAtMs + this.ttlMs);

    this.sessions.set(this.digest(token), {
      userId,
      credential,
      createdAt: new Date(createdAtMs),
      expiresAt,
    });

    return { token, expiresAt };
  }

  validate(token: string): string | null {
    return this.resolve(token)?.userId ?? null;
  }

  resolve(token: string): ActiveSession | null {
    if (!this.open || token.length === 0) {
      return null;
    }
    const key = this.digest(token);
    const session = this.sessions.get(key);
    if (!session) {
      return null;
    }
    if (this.isExpired(session)) {
      this.sessions.delete(key);
      return null;
    }
    return session;
  }

  revoke(token: string): void {
    if (token.length === 0) {
      return;
    }
    this.sessions.delete(this.digest(token));
  }

  revokeUser(userId: string): number {
    let removed = 0;
    for (const [key, session] of this.sessions) {
      if (session.userId === userId) {
        this.sessions.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  sweepExpired(): number {
    let removed = 0;
    for (const [key, session] of this.sessions) {
      if (this.isExpired(session)) {
        this.sessions.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  clear(): void {
    this.sessions.clear();
    this.open = false;
  }

  private isExpired(session: ActiveSession): boolean {
    return this.now() >= session.expiresAt.getTime();
  }

  private digest(token: string): string {
    return createHmac("sha256", this.secret).update(token).digest("hex");
  }

  private assertOpen(): void {
    if (!this.open) {
      throw new Error("session store is not initialised");
    }
  }
}
