import { describe, expect, test } from "vitest";
import { applyMigrations } from "../src/adapters/postgres-pool.js";
import { NotFoundError, ValidationError } from "../src/errors.js";
import type { LogContext, Logger } from "../src/observability/logger.js";
import { PostgresConversationRepository } from "../src/repositories/postgres-conversation-repository.js";
import { FakeSqlPool, type FakeQueryHandler } from "./support/fake-sql-pool.js";

const CREATED_AT = new Date("2026-02-01T09:00:00.000Z");

function conversationRow(id: string, title = "Saved") {
  return {
    id,
    user_id: "user-1",
    title,
    created_at: CREATED_AT,
    updated_at: CREATED_AT,
  };
}

function appendHandler(options: { existingSeq: number; failOnSeq?: number }): FakeQueryHandler {
  return (text, values) => {
    if (text.endsWith("FOR UPDATE")) {
      return [{ id: values[0] }];
    }
    if (text.startsWith("SELECT COALESCE(MAX(seq), 0)::int AS max_seq")) {
      return [{ max_seq: options.existingSeq }];
    }
    if (text.startsWith("INSERT INTO messages")) {
      if (values[2] === options.failOnSeq) {
        return new Error("insert failed");
      }
      return [
        {
          id: values[0],
          conversation_id: values[1],
          seq: values[2],
          role: values[3],
          content: values[4],
          created_at: values[5],
        },
      ];
    }
    if (text.startsWith("UPDATE conversations SET updated_at")) {
      return { rowCount: 1 };
    }
    throw new Error(`unexpected statement: ${text}`);
  };
}

/** Keeps inserted message rows so later appends see them. */
function messageTableHandler(rows: Record<string, unknown>[]): FakeQueryHandler {
  return (text, values) => {
    if (text.endsWith("FOR UPDATE")) {
      return [{ id: values[0] }];
    }
    if (text.startsWith("SELECT COALESCE(MAX(seq), 0)::int AS max_seq")) {
      const last = rows[rows.length - 1];
      return [{ max_seq: rows.length, last_created_at: last?.created_at ?? null }];
    }
    if (text.startsWith("INSERT INTO messages")) {
      const row = {
        id: values[0],
        conversation_id: values[1],
        seq: values[2],
        role: values[3],
        content: values[4],
        created_at: values[5],
      };
      rows.push(row);
      return [row];
    }
    if (text.startsWith("UPDATE conversations SET updated_at")) {
      return { rowCount: 1 };
    }
    throw new Error(`unexpected statement: ${text}`);
  };
}

describe("PostgresConversationRepository", () => {
  test("should append a batch inside one transaction after the last seq", async () => {
    const pool = new FakeSqlPool(appendHandler({ existingSeq: 2 }));
    const repo = new PostgresConversationRepository(pool);

    const appended = await repo.appendMessages("conv-1", [
      { role: "user", content: "question" },
      { role: "assistant", content: "answer" },
    ]);

    expect(appended.map((m) => [m.seq, m.role, m.content])).toEqual([
      [3, "user", "question"],
      [4, "assistant", "answer"],
    ]);
    expect(pool.verbs()).toEqual([
      "BEGIN",
      "SELECT",
      "SELECT",
      "INSERT",
      "INSERT",
      "UPDATE",
      "COMMIT",
    ]);
    const update = pool.statements[5];
    expect(update?.values).toEqual(["conv-1", appended[1]?.createdAt]);
    expect(appended[1]?.createdAt.getTime()).toBe(
      (appended[0]?.createdAt.getTime() ?? 0) + 1,
    );
    expect(pool.released).toBe(1);
  });

  test("should roll back when an insert fails part way", async () => {
    const pool = new FakeSqlPool(appendHandler({ existingSeq: 0, failOnSeq: 2 }));
    const repo = new PostgresConversationRepository(pool);

    await expect(
      repo.appendMessages("conv-1", [
        { role: "user", content: "question" },
        { role: "assistant", content: "answer" },
      ]),
    ).rejects.toThrow("insert failed");

    expect(pool.verbs()).toEqual([
      "BEGIN",
      "SELECT",
      "SELECT",
      "INSERT",
      "INSERT",
      "ROLLBACK",
    ]);
    expect(pool.released).toBe(1);
  });

  test("should report a missing conversation and roll back", async () => {
    const pool = new FakeSqlPool((text) => {
      if (text.endsWith("FOR UPDATE")) {
        return [];
      }
      throw new Error(`unexpected statement: ${text}`);
    });
    const repo = new PostgresConversationRepository(pool);

    await expect(
      repo.appendMessages("missing", [{ role: "user", content: "hi" }]),
    ).rejects.toThrow(NotFoundError);
    expect(pool.verbs()).toEqual(["BEGIN", "SELECT", "ROLLBACK"]);
  });

  test("should validate roles before touching the database", async () => {
    const pool = new FakeSqlPool(appendHandler({ existingSeq: 0 }));
    const repo = new PostgresConversationRepository(pool);

    await expect(
      repo.appendMessages("conv-1", [{ role: "tool", content: "x" }]),
    ).rejects.toThrow(ValidationError);
    expect(pool.statements).toEqual([]);
  });

  test("should list with the owner and the limit as parameters", async () => {
    const pool = new FakeSqlPool(() => [conversationRow("conv-1")]);
    const repo = new PostgresConversationRepository(pool, 25);

    const listed = await repo.listConversations("user-1");

    expect(listed).toEqual([
      {
        id: "conv-1",
        userId: "user-1",
        title: "Saved",
        createdAt: CREATED_AT,
        updatedAt: CREATED_AT,
      },
    ]);
    expect(pool.statements[0]?.text).toContain(
      "ORDER BY updated_at DESC, created_at DESC LIMIT $2",
    );
    expect(pool.statements[0]?.values).toEqual(["user-1", 25]);
  });

  test("should load messages only for an owned conversation", async () => {
    const missingPool = new FakeSqlPool(() => []);
    const missing = new PostgresConversationRepository(missingPool);
    expect(await missing.getConversation("user-1", "conv-1")).toBeNull();
    expect(missingPool.statements).toHaveLength(1);

    const pool = new FakeSqlPool((text) =>
      text.includes("FROM messages")
        ? [
            {
              id: "msg-1",
              conversation_id: "conv-1",
              seq: 1,
              role: "user",
              content: "hello",
              created_at: CREATED_AT,
            },
          ]
        : [conversationRow("conv-1")],
    );
    const repo = new PostgresConversationRepository(pool);
    const detail = await repo.getConversation("user-1", "conv-1");

    expect(detail?.messages).toEqual([
      {
        id: "msg-1",
        conversationId: "conv-1",
        seq: 1,
        role: "user",
        content: "hello",
        createdAt: CREATED_AT,
      },
    ]);
    expect(pool.statements[0]?.values).toEqual(["conv-1", "user-1"]);
  });

  test("should fall back to the default title and report deletes", async () => {
    const pool = new FakeSqlPool((text, values) => {
      if (text.startsWith("INSERT INTO conversations")) {
        return [
          {
            id: values[0],
            user_id: values[1],
            title: values[2],
            created_at: values[3],
            updated_at: values[3],
          },
        ];
      }
      if (text.startsWith("DELETE FROM conversations")) {
        return { rowCount: values[0] === "conv-1" ? 1 : 0 };
      }
      throw new Error(`unexpected statement: ${text}`);
    });
    const repo = new PostgresConversationRepository(pool);

    const created = await repo.createConversation("user-1", "   ");
    expect(created.title).toBe("New Conversation");
    expect(created.updatedAt).toEqual(created.createdAt);

    expect(await repo.deleteConversation("user-1", "conv-1")).toBe(true);
    expect(await repo.deleteConversation("user-1", "conv-2")).toBe(false);
  });

  test("should keep seq and timestamps increasing across turns", async () => {
    const rows: Record<string, unknown>[] = [];
    const pool = new FakeSqlPool(messageTableHandler(rows));
    const repo = new PostgresConversationRepository(pool);
    const sentAt = new Date("2026-02-01T09:00:00.000Z");
    const repliedAt = new Date("2026-02-01T09:00:05.000Z");

    const first = await repo.appendMessages("conv-1", [
      { role: "user", content: "one", createdAt: sentAt },
      { role: "assistant", content: "two", createdAt: repliedAt },
    ]);
    // a stamp older than the stored reply moves past it
    const second = await repo.appendMessages("conv-1", [
      { role: "user", content: "three", createdAt: sentAt },
    ]);

    expect([...first, ...second].map((m) => [m.seq, m.content, m.createdAt])).toEqual([
      [1, "one", sentAt],
      [2, "two", repliedAt],
      [3, "three", new Date(repliedAt.getTime() + 1)],
    ]);
    const lastUpdate = pool.statements.filter((statement) =>
      statement.text.startsWith("UPDATE conversations"),
    )[1];
    expect(lastUpdate?.values).toEqual(["conv-1", second[0]?.createdAt]);
  });

  test("should log a failed rollback and rethrow the original error", async () => {
    const errors: { message: string; fields?: LogContext }[] = [];
    const logger: Logger = {
      child: () => logger,
      debug: () => {},
      info: () => {},
      warn: () => {},
      error: (message, fields) => {
        errors.push({ message, fields });
      },
    };
    const pool = new FakeSqlPool((text) => {
      if (text.endsWith("FOR UPDATE")) {
        return new Error("lock timeout");
      }
      throw new Error(`unexpected statement: ${text}`);
    });
    pool.failRollback = new Error("connection reset");
    const repo = new PostgresConversationRepository(pool, 50, logger);

    await expect(
      repo.appendMessages("conv-1", [{ role: "user", content: "hi" }]),
    ).rejects.toThrow("lock timeout");
    expect(errors.map((entry) => [entry.message, entry.fields?.error])).toEqual([
      ["rollback failed", "connection reset"],
    ]);
    expect(pool.released).toBe(1);
  });

  test("should declare cascading deletes from users down to messages", async () => {
    const pool = new FakeSqlPool(() => []);

    await applyMigrations(pool);

    const schema = pool.statements[0]?.text ?? "";
    expect(schema).toContain(
      "user_id TEXT NOT NULL REFERENCES users (id) ON DELETE CASCADE",
    );
    expect(schema).toContain(
      "conversation_id TEXT NOT NULL REFERENCES conversations (id) ON DELETE CASCADE",
    );
    expect(schema).toContain("UNIQUE (conversation_id, seq)");
  });
});
