import { describe, it, expect, beforeEach } from "vitest";
import { runMigrations } from "../db.js";
import { StoreError } from "../errors.js";
import { PostgresCompetitionStore } from "../services/store/postgresStore.js";
import { match } from "./helpers/espn.js";
import { FakePool } from "./helpers/fakePg.js";

describe("PostgresCompetitionStore", () => {
  let pool: FakePool;
  let store: PostgresCompetitionStore;

  const a = match();
  const b = match({ kickoffTime: "2025-03-08T20:00:00Z" });

  beforeEach(() => {
    pool = new FakePool();
    store = new PostgresCompetitionStore(pool);
  });

  it("creates the snapshot table", async () => {
    await runMigrations(pool);

    expect(pool.queries[0]?.text).toContain("CREATE TABLE IF NOT EXISTS competition_snapshot");
    expect(pool.released).toBe(1);
  });

  it("upserts inside a transaction", async () => {
    await store.save("Brazilian Serie A", [a, b]);

    expect(pool.queries.map((q) => q.text.split(" ")[0])).toEqual(["BEGIN", "INSERT", "COMMIT"]);
    expect(pool.queries[1]?.text).toContain("ON CONFLICT (name) DO UPDATE");
    expect(pool.queries[1]?.params).toEqual(["Brazilian Serie A", JSON.stringify([a, b])]);
    expect(pool.released).toBe(1);
  });

  it("overwrites a competition on save", async () => {
    await store.save("Brazilian Serie A", [a, b]);
    await store.save("Brazilian Serie A", [a]);

    expect(await store.load("Brazilian Serie A")).toEqual([a]);
  });

  it("returns nothing for an unknown competition", async () => {
    expect(await store.load("Copa do Brasil")).toBeUndefined();
  });

  it("lists all competitions", async () => {
    await store.save("Copa do Brasil", [b]);
    await store.save("Brazilian Serie A", [a]);

    const all = await store.loadAll();

    expect(all).toEqual([
      { name: "Brazilian Serie A", matches: [a] },
      { name: "Copa do Brasil", matches: [b] },
    ]);
  });

  it("rolls back and reports io_failure when the write fails", async () => {
    pool.failOn = /^INSERT/;

    const error = await store.save("Brazilian Serie A", [a]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StoreError);
    expect(error).toMatchObject({ reason: "io_failure" });
    expect(pool.queries.map((q) => q.text)).toContain("ROLLBACK");
    expect(pool.released).toBe(1);
  });

  it("reports stored rows of the wrong shape as corrupt", async () => {
    pool.rows.set("Brazilian Serie A", { not: "a list" });

    await expect(store.load("Brazilian Serie A")).rejects.toMatchObject({ reason: "corrupt_document" });
  });

  it("closes the pool", async () => {
    await store.close();
    expect(pool.ended).toBe(true);
  });
});
