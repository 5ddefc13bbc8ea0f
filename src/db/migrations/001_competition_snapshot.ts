import type { SqlClient } from "../../db.js";

export async function up(client: SqlClient): Promise<void> {
  // One row per competition, overwritten on every save
  await client.query(`
    CREATE TABLE IF NOT EXISTS competition_snapshot (
      name TEXT PRIMARY KEY,
      matches JSONB NOT NULL,
      "updatedAt" TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}
