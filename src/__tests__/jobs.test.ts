import { describe, it, expect } from "vitest";
import { runCommand, USAGE } from "../commands.js";
import { loadConfig } from "../config.js";
import { FetchError } from "../errors.js";
import { addToCalendar, buildScheduledJobs, loadDatabase } from "../services/jobs.js";
import { matchesForTeam } from "../services/store/types.js";
import { palmeiras, type EventInput } from "./helpers/espn.js";
import { FLA, PAL, SCHEDULES, createTestServices } from "./helpers/services.js";

describe("loadDatabase", () => {
  it("groups every team's matches into deduplicated competitions", async () => {
    const services = createTestServices(SCHEDULES);

    const report = await loadDatabase(services);

    expect(report.failures).toEqual([]);
    expect(report.competitions).toEqual([
      { name: "Brazilian Serie A", matches: 2 },
      { name: "Copa do Brasil", matches: 1 },
    ]);
    const serieA = await services.store.load("Brazilian Serie A");
    expect(serieA?.map((m) => `${m.homeTeam.abbreviation}-${m.awayTeam.abbreviation}`)).toEqual(["FLA-PAL", "PAL-COR"]);
  });

  it("records a failing team and still saves the rest", async () => {
    const services = createTestServices({
      FLAMENGO: SCHEDULES.FLAMENGO ?? [],
      PALMEIRAS: new Error("HTTP 503"),
    });

    const report = await loadDatabase(services);

    expect(report.teams.map((t) => t.team)).toEqual(["FLAMENGO"]);
    expect(report.failures).toEqual([
      { team: "PALMEIRAS", reason: "unavailable", message: "All strategies failed for PALMEIRAS (scripted)", kept: 0 },
    ]);
    expect(services.store.saves).toBe(2);
  });

  it("keeps a failed team's stored matches until it can be fetched again", async () => {
    const schedules: Record<string, EventInput[] | Error> = { ...SCHEDULES };
    const services = createTestServices(schedules);
    await loadDatabase(services);

    schedules.PALMEIRAS = new Error("HTTP 503");
    const report = await loadDatabase(services);

    expect(report.failures).toMatchObject([{ team: "PALMEIRAS", reason: "unavailable", kept: 1 }]);
    expect(report.competitions).toEqual([
      { name: "Brazilian Serie A", matches: 2 },
      { name: "Copa do Brasil", matches: 1 },
    ]);
    expect(await matchesForTeam(services.store, palmeiras)).toHaveLength(2);
  });
});

describe("addToCalendar", () => {
  it("syncs stored matches for the team", async () => {
    const services = createTestServices(SCHEDULES);
    await loadDatabase(services);

    const report = await addToCalendar(services, "flamengo");

    expect(report).toMatchObject({ team: "FLAMENGO", source: "store", matches: 2 });
    expect(report.sync).toMatchObject({ created: 2, updated: 0, unchanged: 0, failed: 0 });
    expect(report.fetch).toBeUndefined();
  });

  it("fetches live without touching the store", async () => {
    const services = createTestServices({
      PALMEIRAS: [{ date: "2025-03-01T20:00Z", home: FLA, away: PAL }],
    });

    const report = await addToCalendar(services, "Palmeiras", "live");

    expect(report.fetch?.strategy).toBe("scripted");
    expect(report.sync.created).toBe(1);
    expect(services.store.saves).toBe(0);
  });

  it("rejects unknown teams", async () => {
    const services = createTestServices(SCHEDULES);

    const error = await addToCalendar(services, "Atlantis").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ reason: "not_found" });
  });
});

describe("buildScheduledJobs", () => {
  it("adds the calendar job only when teams are configured", () => {
    const services = createTestServices(SCHEDULES);

    expect(buildScheduledJobs(services, loadConfig({})).map((j) => j.name)).toEqual(["load-database"]);
    expect(
      buildScheduledJobs(services, loadConfig({ CALENDAR_TEAMS: "FLAMENGO" })).map((j) => j.name)
    ).toEqual(["load-database", "calendar-sync"]);
  });

  it("fails the load job when a team could not be fetched", async () => {
    const services = createTestServices({ FLAMENGO: new Error("timeout") });
    const [job] = buildScheduledJobs(services, loadConfig({}));

    await expect(job?.run()).rejects.toThrow("Fetch failed for FLAMENGO (unavailable)");
  });

  it("syncs configured teams from the store", async () => {
    const services = createTestServices(SCHEDULES);
    await loadDatabase(services);
    const jobs = buildScheduledJobs(services, loadConfig({ CALENDAR_TEAMS: "FLAMENGO,PALMEIRAS" }));

    await jobs[1]?.run();

    // 2 Flamengo events + 2 Palmeiras events (the derby is tagged per team)
    expect(services.provider.events.size).toBe(4);
  });
});

describe("runCommand", () => {
  function capture() {
    const lines: string[] = [];
    return { lines, print: (line: string) => void lines.push(line) };
  }

  it("lists the registry", async () => {
    const out = capture();

    const code = await runCommand("list-teams", [], createTestServices(SCHEDULES), out.print);

    expect(code).toBe(0);
    expect(out.lines).toEqual([
      `${"FLAMENGO".padEnd(16)} Flamengo (espn 819)`,
      `${"PALMEIRAS".padEnd(16)} Palmeiras (espn 2029)`,
    ]);
  });

  it("prints a load summary", async () => {
    const out = capture();

    const code = await runCommand("load-database", [], createTestServices(SCHEDULES), out.print);

    expect(code).toBe(0);
    expect(out.lines).toEqual([
      "FLAMENGO: fetched 2, normalized 2, dropped 0 (scripted)",
      "PALMEIRAS: fetched 2, normalized 2, dropped 0 (scripted)",
      'saved "Brazilian Serie A": 2 matches',
      'saved "Copa do Brasil": 1 matches',
    ]);
  });

  it("exits non-zero when a team is unavailable", async () => {
    const out = capture();
    const services = createTestServices({ FLAMENGO: new Error("timeout") });

    expect(await runCommand("load-database", [], services, out.print)).toBe(1);
  });

  it("prints a sync summary", async () => {
    const out = capture();
    const services = createTestServices(SCHEDULES);

    const code = await runCommand("add-team-to-calendar", ["FLAMENGO"], services, out.print);

    expect(code).toBe(0);
    expect(out.lines).toEqual([
      "FLAMENGO: fetched 2, normalized 2, dropped 0 (scripted)",
      "FLAMENGO: created 2, updated 0, unchanged 0, failed 0",
    ]);
  });

  it("exits non-zero for an unknown team", async () => {
    const out = capture();

    const code = await runCommand("add-to-calendar", ["Atlantis"], createTestServices(SCHEDULES), out.print);

    expect(code).toBe(1);
    expect(out.lines).toEqual(['add-to-calendar failed (not_found): Team "Atlantis" is not in the registry']);
  });

  it("exits non-zero when the calendar rejects the credentials", async () => {
    const services = createTestServices(SCHEDULES);
    services.provider.listError = Object.assign(new Error("unauthorized_client"), { code: 401 });

    const code = await runCommand("add-team-to-calendar", ["FLAMENGO"], services, capture().print);

    expect(code).toBe(1);
  });

  it("only warns about per-event failures", async () => {
    const out = capture();
    const services = createTestServices(SCHEDULES);
    services.provider.failInsert = (event) => event.summary.includes("Santos");

    const code = await runCommand("add-team-to-calendar", ["FLAMENGO"], services, out.print);

    expect(code).toBe(0);
    expect(out.lines[1]).toBe("FLAMENGO: created 1, updated 0, unchanged 0, failed 1");
    expect(out.lines[2]).toBe("  warning: ⚽ Santos vs Flamengo (2025-03-05T22:00:00Z): Rate Limit Exceeded");
  });

  it("prints usage for missing arguments and unknown commands", async () => {
    const out = capture();
    const services = createTestServices(SCHEDULES);

    expect(await runCommand("add-to-calendar", [], services, out.print)).toBe(2);
    expect(await runCommand("dance", [], services, out.print)).toBe(2);
    expect(await runCommand(undefined, [], services, out.print)).toBe(0);
    expect(out.lines.at(-1)).toBe(USAGE);
  });
});
