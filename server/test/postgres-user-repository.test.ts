import { describe, expect, test } from "vitest";
import { PostgresUserRepository } from "../src/repositories/postgres-user-repository.js";
import { FakeSqlPool } from "./support/fake-sql-pool.js";

const CREATED_AT = new Date("2026-02-01T09:00:00.000Z");

describe("PostgresUserRepository", () => {
  test("should upsert on the account id and return the stored row", async () => {
    const pool = new FakeSqlPool((text, values) => {
      if (text.startsWith("INSERT INTO users")) {
        return [
          {
            id: "user-1",
            account_id: values[1],
            email: values[2],
            name: values[3],
            created_at: CREATED_AT,
            last_login_at: null,
          },
        ];
      }
      throw new Error(`unexpected statement: ${text}`);
    });
    const users = new PostgresUserRepository(pool);

    const user = await users.createUser({ accountId: "acct-1", email: "a@example.com" });

    expect(user).toEqual({
      id: "user-1",
      accountId: "acct-1",
      email: "a@example.com",
      name: null,
      createdAt: CREATED_AT,
      lastLoginAt: null,
    });
    expect(pool.statements[0]?.text).toContain(
      "ON CONFLICT (account_id) DO UPDATE SET account_id = EXCLUDED.account_id",
    );
  });

  test("should report whether a delete removed the user", async () => {
    const pool = new FakeSqlPool((text, values) => {
      if (text.startsWith("DELETE FROM users")) {
        return { rowCount: values[0] === "user-1" ? 1 : 0 };
      }
      throw new Error(`unexpected statement: ${text}`);
    });
    const users = new PostgresUserRepository(pool);

    expect(await users.deleteUser("user-1")).toBe(true);
    expect(await users.deleteUser("user-2")).toBe(false);
    expect(pool.statements.map((statement) => statement.values)).toEqual([
      ["user-1"],
      ["user-2"],
    ]);
  });

  test("should map a missing user to null", async () => {
    const pool = new FakeSqlPool(() => []);
    const users = new PostgresUserRepository(pool);

    expect(await users.findById("nobody")).toBeNull();
  });
});
