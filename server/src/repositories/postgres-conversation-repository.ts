import { randomUUID } from "node:crypto";
import {
  assertMessageBatch,
  resolveTitle,
  stampMessages,
  type ConversationDetailRecord,
  type ConversationRecord,
  type ConversationRepository,
  type MessageRecord,
  type MessageRole,
  type NewMessage,
} from "./conversation-repository.js";
import { withTransaction, type SqlPool } from "../adapters/postgres-pool.js";
import { NotFoundError } from "../errors.js";
import type { Logger } from "../observability/logger.js";

interface ConversationRow {
  id: string;
  user_id: string;
  title: string;
  created_at: Date;
  updated_at: Date;
}

interface MessageRow {
  id: string;
  conversation_id: string;
  seq: number;
  role: MessageRole;
  content: string;
  created_at: Date;
}

export class PostgresConversationRepository implements ConversationRepository {
  constructor(
    private readonly pool: SqlPool,
    private readonly listLimit = 50,
    private readonly logger?: Logger,
  ) {}

  async listConversations(
    userId: string,
  ): Promise<readonly ConversationRecord[]> {
    const result = await this.pool.query<ConversationRow>(
      `
        SELECT id, user_id, title, created_at, updated_at
        FROM conversations
        WHERE user_id = $1
        ORDER BY updated_at DESC, created_at DESC
        LIMIT $2
      `,
      [userId, this.listLimit],
    );
    return result.rows.map(toConversation);
  }

  async getConversation(
    userId: string,
    id: string,
  ): Promise<ConversationDetailRecord | null> {
    const result = await this.pool.query<ConversationRow>(
      `
        SELECT id, user_id, title, created_at, updated_at
        FROM conversations
        WHERE id = $1
          AND user_id = $2
      `,
      [id, userId],
    );
    const row = result.rows[0];
    if (!row) {
      return null;
    }

    const messages = await this.pool.query<MessageRow>(
      `
        SELECT id, conversation_id, seq, role, content, created_at
        FROM messages
        WHERE conversation_id = $1
        ORDER BY seq ASC
      `,
      [id],
    );

    return {
      ...toConversation(row),
      messages: messages.rows.map(toMessage),
    };
  }

  async createConversation(
    userId: string,
    title?: string,
  ): Promise<ConversationRecord> {
    const now = new Date();
    const result = await this.pool.query<ConversationRow>(
      `
        INSERT INTO conversations (id, user_id, title, created_at, updated_at)
        VALUES ($1, $2, $3, $4, $4)
        RETURNING id, user_id, title, created_at, updated_at
      `,
      [randomUUID(), userId, resolveTitle(title), now],
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error(`conversation insert returned no row for user ${userId}`);
    }
    return toConversation(row);
  }

  async renameConversation(
    userId: string,
    id: string,
    title: string,
  ): Promise<ConversationRecord | null> {
    const result = await this.pool.query<ConversationRow>(
      `
        UPDATE conversations
        SET title = $3
        WHERE id = $1
          AND user_id = $2
        RETURNING id, user_id, title, created_at, updated_at
      `,
      [id, userId, resolveTitle(title)],
    );
    const row = result.rows[0];
    return row ? toConversation(row) : null;
  }

  async deleteConversation(userId: string, id: string): Promise<boolean> {
    // messages go with it through ON DELETE CASCADE, in the same statement
    const result = await this.pool.query(
      `
        DELETE FROM conversations
        WHERE id = $1
          AND user_id = $2
      `,
      [id, userId],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async appendMessages(
    conversationId: string,
    messages: readonly NewMessage[],
  ): Promise<readonly MessageRecord[]> {
    const batch = assertMessageBatch(messages);
    const now = new Date();

    return withTransaction(this.pool, async (client) => {
      const locked = await client.query<{ id: string }>(
        `
          SELECT id
          FROM conversations
          WHERE id = $1
          FOR UPDATE
        `,
        [conversationId],
      );
      if ((locked.rowCount ?? 0) === 0) {
        throw new NotFoundError();
      }

      const last = await client.query<{
        max_seq: number;
        last_created_at: Date | null;
      }>(
        `
          SELECT COALESCE(MAX(seq), 0)::int AS max_seq, MAX(created_at) AS last_created_at
          FROM messages
          WHERE conversation_id = $1
        `,
        [conversationId],
      );
      const baseSeq = last.rows[0]?.max_seq ?? 0;
      const stamped = stampMessages(batch, now, last.rows[0]?.last_created_at ?? null);

      const appended: MessageRecord[] = [];
      for (const [i, message] of stamped.entries()) {
        const inserted = await client.query<MessageRow>(
          `
            INSERT INTO messages (id, conversation_id, seq, role, content, created_at)
            VALUES ($1, $2, $3, $4, $5, $6)
            RETURNING id, conversation_id, seq, role, content, created_at
          `,
          [
            randomUUID(),
            conversationId,
            baseSeq + i + 1,
            message.role,
            message.content,
            message.createdAt,
          ],
        );
        const row = inserted.rows[0];
        if (!row) {
          throw new Error(`message insert returned no row for ${conversationId}`);
        }
        appended.push(toMessage(row));
      }

      await client.query(
        `
          UPDATE conversations
          SET updated_at = $2
          WHERE id = $1
        `,
        [conversationId, appended[appended.length - 1]?.createdAt ?? now],
      );

      return appended;
    }, this.logger);
  }
}

function toConversation(row: ConversationRow): ConversationRecord {
  return {
    id: row.id,
    userId: row.user_id,
    title: row.title,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toMessage(row: MessageRow): MessageRecord {
  return {
    id: row.id,
    conversationId: row.conversation_id,
    seq: row.seq,
    role: row.role,
    content: row.content,
    createdAt: row.created_at,
  };
}
