import { randomUUID } from "node:crypto";
import type { SqlClient } from "../adapters/postgres-pool.js";
import type {
  CredentialIdentity,
  UserRecord,
  UserRepository,
} from "./user-repository.js";

interface UserRow {
  id: string;
  account_id: string;
  email: string | null;
  name: string | null;
  created_at: Date;
  last_login_at: Date | null;
}

const USER_COLUMNS = "id, account_id, email, name, created_at, last_login_at";

export class PostgresUserRepository implements UserRepository {
  constructor(private readonly pool: SqlClient) {}

  async createUser(identity: CredentialIdentity): Promise<UserRecord> {
    // a no-op update makes RETURNING yield the existing row on conflict
    const result = await this.pool.query<UserRow>(
      `
        INSERT INTO users (id, account_id, email, name, created_at)
        VALUES ($1, $2, $3, $4, $5)
        ON CONFLICT (account_id)
        DO UPDATE SET account_id = EXCLUDED.account_id
        RETURNING ${USER_COLUMNS}
      `,
      [
        randomUUID(),
        identity.accountId,
        identity.email ?? null,
        identity.name ?? null,
        new Date(),
      ],
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error(`user upsert returned no row: ${identity.accountId}`);
    }
    return toUser(row);
  }

  async findById(id: string): Promise<UserRecord | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id],
    );
    const row = result.rows[0];
    return row ? toUser(row) : null;
  }

  async recordLogin(id: string, at: Date): Promise<void> {
    await this.pool.query(
      `UPDATE users SET last_login_at = $2 WHERE id = $1`,
      [id, at],
    );
  }

  async deleteUser(id: string): Promise<boolean> {
    const result = await this.pool.query(`DELETE FROM users WHERE id = $1`, [id]);
    return (result.rowCount ?? 0) > 0;
  }
}

function toUser(row: UserRow): UserRecord {
  return {
    id: row.id,
    accountId: row.account_id,
    email: row.email,
    name: row.name,
    createdAt: row.created_at,
    lastLoginAt: row.last_login_at,
  };
}
