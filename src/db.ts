import pg from "pg";
import { up as competitionSnapshotMigration } from "./db/migrations/001_competition_snapshot.js";

const { Pool } = pg;

export interface QueryResultLike {
  rows: unknown[];
  rowCount: number | null;
}

// The slice of pg the store uses; tests hand in a scripted fake
export interface SqlClient {
  query(text: string, params?: unknown[]): Promise<QueryResultLike>;
  release(): void;
}

export interface SqlPool {
  connect(): Promise<SqlClient>;
  end(): Promise<void>;
}

export type Migration = (client: SqlClient) => Promise<void>;

const MIGRATIONS: Migration[] = [competitionSnapshotMigration];

export function createPool(connectionString: string): SqlPool {
  const pool = new Pool({ connectionString });
  pool.on("error", (err) => {
    console.error("[Store] Idle PostgreSQL client error:", err.message);
  });

  return {
    async connect() {
      const client = await pool.connect();
      return {
        query: (text, params) => client.query(text, params),
        release: () => client.release(),
      };
    },
    end: () => pool.end(),
  };
}

// Transaction helper
export async function withTransaction<T>(
  pool: SqlPool,
  fn: (client: SqlClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (e) {
    await client.query("ROLLBACK");
    throw e;
  } finally {
    client.release();
  }
}

// Run migrations in order; each one is idempotent
export async function runMigrations(pool: SqlPool): Promise<void> {
  const client = await pool.connect();
  try {
    for (const migration of MIGRATIONS) {
      await migration(client);
    }
  } finally {
    client.release();
  }
}
