import { randomUUID } from "node:crypto";
import {
  assertMessageBatch,
  resolveTitle,
  stampMessages,
  type ConversationDetailRecord,
  type ConversationRecord,
  type ConversationRepository,
  type MessageRecord,
  type NewMessage,
} from "./conversation-repository.js";
import { NotFoundError } from "../errors.js";

export interface InMemoryConversationRepositoryOptions {
  readonly now?: () => Date;
  readonly listLimit?: number;
}

export class InMemoryConversationRepository implements ConversationRepository {
  private readonly conversations = new Map<string, ConversationRecord>();
  private readonly messages = new Map<string, MessageRecord[]>();
  private readonly now: () => Date;
  private readonly listLimit: number;

  constructor(options: InMemoryConversationRepositoryOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.listLimit = options.listLimit ?? 50;
  }

  async listConversations(
    userId: string,
  ): Promise<readonly ConversationRecord[]> {
    return Array.from(this.conversations.values())
      .filter((conversation) => conversation.userId === userId)
      .sort((a, b) => {
        const byUpdate = b.updatedAt.getTime() - a.updatedAt.getTime();
        if (byUpdate !== 0) {
          return byUpdate;
        }
        return b.createdAt.getTime() - a.createdAt.getTime();
      })
      .slice(0, this.listLimit)
      .map((conversation) => ({ ...conversation }));
  }

  async getConversation(
    userId: string,
    id: string,
  ): Promise<ConversationDetailRecord | null> {
    const conversation = this.findOwned(userId, id);
    if (!conversation) {
      return null;
    }
    const messages = this.messages.get(id) ?? [];
    return {
      ...conversation,
      messages: messages.map((message) => ({ ...message })),
    };
  }

  async createConversation(
    userId: string,
    title?: string,
  ): Promise<ConversationRecord> {
    const now = this.now();
    const created: ConversationRecord = {
      id: randomUUID(),
      userId,
      title: resolveTitle(title),
      createdAt: now,
      updatedAt: now,
    };
    this.conversations.set(created.id, created);
    this.messages.set(created.id, []);
    return { ...created };
  }

  async renameConversation(
    userId: string,
    id: string,
    title: string,
  ): Promise<ConversationRecord | null> {
    const conversation = this.findOwned(userId, id);
    if (!conversation) {
      return null;
    }
    const renamed: ConversationRecord = {
      ...conversation,
      title: resolveTitle(title),
    };
    this.conversations.set(id, renamed);
    return { ...renamed };
  }

  async deleteConversation(userId: string, id: string): Promise<boolean> {
    if (!this.findOwned(userId, id)) {
      return false;
    }
    this.conversations.delete(id);
    this.messages.delete(id);
    return true;
  }

  async appendMessages(
    conversationId: string,
    messages: readonly NewMessage[],
  ): Promise<readonly MessageRecord[]> {
    const batch = assertMessageBatch(messages);
    const conversation = this.conversations.get(conversationId);
    if (!conversation) {
      throw new NotFoundError();
    }

    const existing = this.messages.get(conversationId) ?? [];
    const stamped = stampMessages(
      batch,
      this.now(),
      existing[existing.length - 1]?.createdAt ?? null,
    );
    const appended: MessageRecord[] = stamped.map((message, index) => ({
      id: randomUUID(),
      conversationId,
      seq: existing.length + index + 1,
      role: message.role,
      content: message.content,
      createdAt: message.createdAt,
    }));

    this.messages.set(conversationId, [...existing, ...appended]);
    this.conversations.set(conversationId, {
      ...conversation,
      updatedAt: appended[appended.length - 1]?.createdAt ?? conversation.updatedAt,
    });

    return appended.map((message) => ({ ...message }));
  }

  /** Cascade target for user deletion. */
  removeOwnedBy(userId: string): number {
    let removed = 0;
    for (const [id, conversation] of this.conversations) {
      if (conversation.userId === userId) {
        this.conversations.delete(id);
        this.messages.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  private findOwned(userId: string, id: string): ConversationRecord | undefined {
    const conversation = this.conversations.get(id);
    if (!conversation || conversation.userId !== userId) {
      return undefined;
    }
    return conversation;
  }
}
