import { withTransaction, type SqlPool } from "../../db.js";
import { StoreError, errorMessage } from "../../errors.js";
import type { Competition, Match } from "../../types/fixtures.js";
import { isRecord, readString } from "../fixtures/guards.js";
import { parseMatches } from "./document.js";
import type { CompetitionStore } from "./types.js";

// Snapshots in the competition_snapshot table (see db/migrations)
export class PostgresCompetitionStore implements CompetitionStore {
  readonly driver = "postgres";

  constructor(private readonly pool: SqlPool) {}

  async save(competition: string, matches: Match[]): Promise<void> {
    await this.run(`save "${competition}"`, () =>
      withTransaction(this.pool, async (client) => {
        await client.query(
          `INSERT INTO competition_snapshot (name, matches, "updatedAt")
           VALUES ($1, $2::jsonb, NOW())
           ON CONFLICT (name) DO UPDATE
           SET matches = EXCLUDED.matches, "updatedAt" = EXCLUDED."updatedAt"`,
          [competition, JSON.stringify(matches)]
        );
      })
    );
    console.log(`[Store] Saved ${matches.length} matches for "${competition}"`);
  }

  async load(competition: string): Promise<Match[] | undefined> {
    const rows = await this.select(
      `SELECT name, matches FROM competition_snapshot WHERE name = $1`,
      [competition]
    );
    return rows[0]?.matches;
  }

  async loadAll(): Promise<Competition[]> {
    return this.select(`SELECT name, matches FROM competition_snapshot ORDER BY name`);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async select(text: string, params?: unknown[]): Promise<Competition[]> {
    const result = await this.run("query snapshots", async () => {
      const client = await this.pool.connect();
      try {
        return await client.query(text, params);
      } finally {
        client.release();
      }
    });

    return result.rows.map((row) => {
      const name = isRecord(row) ? readString(row.name) : undefined;
      if (!isRecord(row) || !name) {
        throw new StoreError("competition_snapshot row has no name", "corrupt_document");
      }
      return { name, matches: parseMatches(row.matches, `"${name}"`) };
    });
  }

  private async run<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new StoreError(`Could not ${action}: ${errorMessage(error)}`, "io_failure", { cause: error });
    }
  }
}
