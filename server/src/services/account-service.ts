import type { CredentialVerifier } from "../auth/anthropic-credential-verifier.js";
import type { ActiveSession, SessionStore } from "../auth/session-store.js";
import { InvalidCredentialError } from "../errors.js";
import type { Logger } from "../observability/logger.js";
import type { UserRecord, UserRepository } from "../repositories/user-repository.js";

export interface LoginResult {
  readonly user: UserRecord;
  readonly sessionToken: string;
  readonly expiresAt: Date;
}

export interface AuthContext {
  readonly user: UserRecord;
  readonly session: ActiveSession;
  readonly token: string;
}

export class AccountService {
  constructor(
    private readonly users: UserRepository,
    private readonly sessions: SessionStore,
    private readonly verifier: CredentialVerifier,
    private readonly logger: Logger,
  ) {}

  async login(credential: string): Promise<LoginResult> {
    const identity = await this.verifier.verify(credential);
    if (!identity) {
      this.logger.warn("login rejected by provider");
      throw new InvalidCredentialError();
    }

    const user = await this.users.createUser(identity);
    const now = new Date();
    await this.users.recordLogin(user.id, now);
    const issued = this.sessions.create(user.id, credential);

    this.logger.info("login succeeded", { userId: user.id });
    return {
      user: { ...user, lastLoginAt: now },
      sessionToken: issued.token,
      expiresAt: issued.expiresAt,
    };
  }

  logout(token: string | undefined): void {
    if (token) {
      this.sessions.revoke(token);
    }
  }

  /** `null` for unknown or expired tokens, and for sessions whose user is gone. */
  async authenticate(token: string): Promise<AuthContext | null> {
    const session = this.sessions.resolve(token);
    if (!session) {
      return null;
    }
    const user = await this.users.findById(session.userId);
    if (!user) {
      this.sessions.revoke(token);
      return null;
    }
    return { user, session, token };
  }

  /** Administrative removal; no HTTP route reaches it. */
  async removeUser(userId: string): Promise<boolean> {
    const revoked = this.sessions.revokeUser(userId);
    const deleted = await this.users.deleteUser(userId);
    this.logger.info("user removed", { userId, revokedSessions: revoked, deleted });
    return deleted;
  }
}
