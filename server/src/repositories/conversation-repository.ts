import { ValidationError } from "../errors.js";

export const MESSAGE_ROLES = ["user", "assistant"] as const;

export type MessageRole = (typeof MESSAGE_ROLES)[number];

export const DEFAULT_CONVERSATION_TITLE = "New Conversation";

export interface ConversationRecord {
  readonly id: string;
  readonly userId: string;
  readonly title: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface MessageRecord {
  readonly id: string;
  readonly conversationId: string;
  readonly seq: number;
  readonly role: MessageRole;
  readonly content: string;
  readonly createdAt: Date;
}

export interface ConversationDetailRecord extends ConversationRecord {
  readonly messages: readonly MessageRecord[];
}

export interface NewMessage {
  readonly role: string;
  readonly content: string;
  /** When the message was written; the append time when absent. */
  readonly createdAt?: Date;
}

export interface CheckedMessage {
  readonly role: MessageRole;
  readonly content: string;
  readonly createdAt?: Date;
}

export interface StampedMessage extends CheckedMessage {
  readonly createdAt: Date;
}

export interface ConversationRepository {
  listConversations(userId: string): Promise<readonly ConversationRecord[]>;
  getConversation(
    userId: string,
    id: string,
  ): Promise<ConversationDetailRecord | null>;
  createConversation(
    userId: string,
    title?: string,
  ): Promise<ConversationRecord>;
  renameConversation(
    userId: string,
    id: string,
    title: string,
  ): Promise<ConversationRecord | null>;
  deleteConversation(userId: string, id: string): Promise<boolean>;
  /**
   * Stores the whole batch or nothing, in order, and moves the
   * conversation's `updatedAt` to the last message's timestamp.
   * Timestamps strictly increase with `seq`.
   */
  appendMessages(
    conversationId: string,
    messages: readonly NewMessage[],
  ): Promise<readonly MessageRecord[]>;
}

export function isMessageRole(value: string): value is MessageRole {
  return MESSAGE_ROLES.some((role) => role === value);
}

export function assertMessageBatch(
  messages: readonly NewMessage[],
): readonly CheckedMessage[] {
  if (messages.length === 0) {
    throw new ValidationError("message batch is empty");
  }
  return messages.map((message) => {
    if (!isMessageRole(message.role)) {
      throw new ValidationError(`invalid message role: ${message.role}`);
    }
    return {
      role: message.role,
      content: message.content,
      ...(message.createdAt ? { createdAt: message.createdAt } : {}),
    };
  });
}

/**
 * Settles each message's timestamp: its own `createdAt` or `now`, pushed
 * forward to at least a millisecond after the one before it (and after
 * `after`, the conversation's latest stored message).
 */
export function stampMessages(
  batch: readonly CheckedMessage[],
  now: Date,
  after: Date | null = null,
): StampedMessage[] {
  let previous = after ? after.getTime() : Number.NEGATIVE_INFINITY;
  return batch.map((message) => {
    const time = Math.max((message.createdAt ?? now).getTime(), previous + 1);
    previous = time;
    return { role: message.role, content: message.content, createdAt: new Date(time) };
  });
}

export function resolveTitle(title: string | undefined): string {
  const trimmed = title?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : DEFAULT_CONVERSATION_TITLE;
}
