import type { QueryResultLike, SqlClient, SqlPool } from "../../db.js";

// Minimal stand-in for pg that understands the competition_snapshot
// statements and records every query it sees
export class FakePool implements SqlPool {
  readonly queries: { text: string; params?: unknown[] }[] = [];
  readonly rows = new Map<string, unknown>();
  failOn?: RegExp;
  released = 0;
  ended = false;

  async connect(): Promise<SqlClient> {
    return {
      query: (text, params) => this.query(text, params),
      release: () => {
        this.released++;
      },
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  private async query(text: string, params?: unknown[]): Promise<QueryResultLike> {
    const sql = text.replace(/\s+/g, " ").trim();
    this.queries.push({ text: sql, params });
    if (this.failOn?.test(sql)) {
      throw new Error("connection terminated unexpectedly");
    }

    if (sql.startsWith("INSERT INTO competition_snapshot")) {
      const [name, matches] = params ?? [];
      this.rows.set(String(name), JSON.parse(String(matches)));
      return { rows: [], rowCount: 1 };
    }
    if (sql.startsWith("SELECT name, matches FROM competition_snapshot WHERE")) {
      const name = String(params?.[0]);
      const matches = this.rows.get(name);
      return matches === undefined ? { rows: [], rowCount: 0 } : { rows: [{ name, matches }], rowCount: 1 };
    }
    if (sql.startsWith("SELECT name, matches FROM competition_snapshot ORDER BY name")) {
      const rows = [...this.rows.entries()]
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([name, matches]) => ({ name, matches }));
      return { rows, rowCount: rows.length };
    }
    return { rows: [], rowCount: 0 };
  }
}
