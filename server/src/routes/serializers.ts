import type {
  ConversationDetailRecord,
  ConversationRecord,
  MessageRecord,
  MessageRole,
} from "../repositories/conversation-repository.js";
import type { UserRecord } from "../repositories/user-repository.js";

export interface UserSummary {
  readonly id: string;
  readonly email: string | null;
  readonly name: string | null;
  readonly created_at: string;
}

export interface ConversationSummary {
  readonly id: string;
  readonly title: string;
  readonly created_at: string;
  readonly updated_at: string;
}

export interface MessageDto {
  readonly id: string;
  readonly role: MessageRole;
  readonly content: string;
  readonly created_at: string;
}

export interface ConversationDetail extends ConversationSummary {
  readonly messages: readonly MessageDto[];
}

export function toUserSummary(user: UserRecord): UserSummary {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    created_at: user.createdAt.toISOString(),
  };
}

export function toConversationSummary(
  conversation: ConversationRecord,
): ConversationSummary {
  return {
    id: conversation.id,
    title: conversation.title,
    created_at: conversation.createdAt.toISOString(),
    updated_at: conversation.updatedAt.toISOString(),
  };
}

export function toConversationDetail(
  conversation: ConversationDetailRecord,
): ConversationDetail {
  return {
    ...toConversationSummary(conversation),
    messages: conversation.messages.map(toMessageDto),
  };
}

function toMessageDto(message: MessageRecord): MessageDto {
  return {
    id: message.id,
    role: message.role,
    content: message.content,
    created_at: message.createdAt.toISOString(),
  };
}
