import { randomUUID } from "node:crypto";
import type {
  CredentialIdentity,
  UserRecord,
  UserRepository,
} from "./user-repository.js";
import type { InMemoryConversationRepository } from "./in-memory-conversation-repository.js";

export class InMemoryUserRepository implements UserRepository {
  private readonly users = new Map<string, UserRecord>();

  constructor(
    private readonly conversations?: InMemoryConversationRepository,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async createUser(identity: CredentialIdentity): Promise<UserRecord> {
    const existing = this.findByAccountId(identity.accountId);
    if (existing) {
      return { ...existing };
    }

    const created: UserRecord = {
      id: randomUUID(),
      accountId: identity.accountId,
      email: identity.email ?? null,
      name: identity.name ?? null,
      createdAt: this.now(),
      lastLoginAt: null,
    };
    this.users.set(created.id, created);
    return { ...created };
  }

  async findById(id: string): Promise<UserRecord | null> {
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }

  async recordLogin(id: string, at: Date): Promise<void> {
    const user = this.users.get(id);
    if (user) {
      this.users.set(id, { ...user, lastLoginAt: at });
    }
  }

  async deleteUser(id: string): Promise<boolean> {
    if (!this.users.delete(id)) {
      return false;
    }
    this.conversations?.removeOwnedBy(id);
    return true;
  }

  private findByAccountId(accountId: string): UserRecord | undefined {
    for (const user of this.users.values()) {
      if (user.accountId === accountId) {
        return user;
      }
    }
    return undefined;
  }
}
