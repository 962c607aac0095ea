import { NotFoundError } from "../errors.js";
import { describeError, type Logger } from "../observability/logger.js";
import type {
  AssistantGateway,
  ChatMessage,
  CompletionOptions,
} from "../providers/types.js";
import type { ConversationRepository } from "../repositories/conversation-repository.js";

const TITLE_MAX_LENGTH = 50;

export interface ChatTurnInput {
  readonly userId: string;
  readonly message: string;
  readonly conversationId?: string | null;
  readonly credential?: string;
}

export interface ChatTurnResult {
  readonly reply: string;
  readonly conversationId: string;
}

export function deriveTitle(message: string): string {
  const trimmed = message.trim();
  return trimmed.length > TITLE_MAX_LENGTH
    ? `${trimmed.slice(0, TITLE_MAX_LENGTH)}...`
    : trimmed;
}

/**
 * One chat turn. Nothing is written until the assistant has answered, and
 * then the user message and the reply go in as one batch, so a failed turn
 * leaves the conversation exactly as it was. The user message keeps the
 * time it was sent, the reply the time it arrived.
 */
export class ChatService {
  constructor(
    private readonly conversations: ConversationRepository,
    private readonly assistant: AssistantGateway,
    private readonly completionOptions: CompletionOptions,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async sendMessage(input: ChatTurnInput): Promise<ChatTurnResult> {
    const sentAt = this.now();
    const existingId = input.conversationId ?? undefined;
    let history: readonly ChatMessage[] = [];

    if (existingId) {
      const conversation = await this.conversations.getConversation(
        input.userId,
        existingId,
      );
      if (!conversation) {
        throw new NotFoundError();
      }
      history = conversation.messages.map((message) => ({
        role: message.role,
        content: message.content,
      }));
    }

    const log = this.logger.child({
      userId: input.userId,
      conversationId: existingId,
      assistant: this.assistant.kind,
    });
    const startedAt = Date.now();
    log.debug("assistant call started", { historyLength: history.length });

    let reply: string;
    try {
      reply = await this.assistant.complete(
        {
          history,
          message: input.message,
          ...(input.credential ? { credential: input.credential } : {}),
        },
        this.completionOptions,
      );
    } catch (error) {
      log.warn("assistant call failed", {
        durationMs: Date.now() - startedAt,
        ...describeError(error),
      });
      throw error;
    }
    const repliedAt = this.now();

    const conversationId =
      existingId ??
      (
        await this.conversations.createConversation(
          input.userId,
          deriveTitle(input.message),
        )
      ).id;

    try {
      await this.conversations.appendMessages(conversationId, [
        { role: "user", content: input.message, createdAt: sentAt },
        { role: "assistant", content: reply, createdAt: repliedAt },
      ]);
    } catch (error) {
      if (!existingId) {
        await this.discardConversation(input.userId, conversationId, log);
      }
      throw error;
    }

    log.info("chat turn stored", {
      conversationId,
      historyLength: history.length,
      durationMs: Date.now() - startedAt,
    });

    return { reply, conversationId };
  }

  private async discardConversation(
    userId: string,
    conversationId: string,
    log: Logger,
  ): Promise<void> {
    try {
      await this.conversations.deleteConversation(userId, conversationId);
    } catch (cleanupError) {
      log.error("could not discard conversation after a failed turn", {
        conversationId,
        ...describeError(cleanupError),
      });
    }
  }
}
