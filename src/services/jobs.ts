import type { AppConfig } from "../config.js";
import { FetchError, errorMessage, type FetchErrorReason } from "../errors.js";
import {
  groupByCompetition,
  involvesTeam,
  type FetchReport,
  type Match,
  type SyncReport,
  type Team,
} from "../types/fixtures.js";
import type { CoreServices } from "./context.js";
import type { JobDefinition } from "./scheduler.js";
import { matchesForTeam } from "./store/types.js";

export interface TeamFailure {
  team: string;
  reason: FetchErrorReason | "error";
  message: string;
  kept: number; // previously stored matches carried into the new snapshot
}

export interface LoadDatabaseReport {
  teams: FetchReport[];
  failures: TeamFailure[];
  competitions: { name: string; matches: number }[];
}

export type MatchSource = "store" | "live";

export interface CalendarRunReport {
  team: string;
  source: MatchSource;
  fetch?: FetchReport;
  matches: number;
  sync: SyncReport;
}

// Stored matches of teams whose fetch failed. A match that also involves a
// team fetched this run is left to that team's fresh data.
async function keepStoredMatches(
  services: CoreServices,
  failed: Team[],
  fetched: Team[]
): Promise<Map<string, Match[]>> {
  const kept = new Map<string, Match[]>();
  if (failed.length === 0) return kept;

  const stored = (await services.store.loadAll()).flatMap((competition) => competition.matches);
  for (const team of failed) {
    kept.set(
      team.id,
      stored.filter(
        (match) => involvesTeam(match, team) && !fetched.some((other) => involvesTeam(match, other))
      )
    );
  }
  return kept;
}

// Fetch every registered team, group by competition and overwrite each
// competition's snapshot. A team that fails is reported, not fatal, and its
// stored matches stay in place until a fetch succeeds again.
export async function loadDatabase(services: CoreServices): Promise<LoadDatabaseReport> {
  const { registry, fetcher, store } = services;
  const report: LoadDatabaseReport = { teams: [], failures: [], competitions: [] };
  const matches: Match[] = [];
  const fetched: Team[] = [];
  const failed: Team[] = [];

  for (const team of registry.list()) {
    try {
      const result = await fetcher.fetchWithReport(team);
      report.teams.push(result);
      fetched.push(team);
      matches.push(...result.matches);
    } catch (error) {
      const reason = error instanceof FetchError ? error.reason : "error";
      console.error(`[Jobs] ${team.id} fetch failed (${reason}): ${errorMessage(error)}`);
      report.failures.push({ team: team.id, reason, message: errorMessage(error), kept: 0 });
      failed.push(team);
    }
  }

  const kept = await keepStoredMatches(services, failed, fetched);
  for (const failure of report.failures) {
    const previous = kept.get(failure.team) ?? [];
    failure.kept = previous.length;
    matches.push(...previous);
    if (previous.length > 0) {
      console.warn(`[Jobs] Keeping ${previous.length} stored matches for ${failure.team}`);
    }
  }

  for (const competition of groupByCompetition(matches)) {
    await store.save(competition.name, competition.matches);
    report.competitions.push({ name: competition.name, matches: competition.matches.length });
  }

  console.log(
    `[Jobs] load-database: ${report.teams.length} teams fetched, ${report.failures.length} failed, ` +
      `${report.competitions.length} competitions saved`
  );
  return report;
}

// `store` reads the last snapshot; `live` fetches the team now and leaves
// the store alone
export async function addToCalendar(
  services: CoreServices,
  teamName: string,
  source: MatchSource = "store"
): Promise<CalendarRunReport> {
  const team = services.registry.require(teamName);

  let fetch: FetchReport | undefined;
  let matches: Match[];
  if (source === "live") {
    fetch = await services.fetcher.fetchWithReport(team);
    matches = fetch.matches;
  } else {
    matches = await matchesForTeam(services.store, team);
    if (matches.length === 0) {
      console.warn(`[Jobs] No stored matches for ${team.id}; run load-database first`);
    }
  }

  const synchronizer = await services.calendar();
  const sync = await synchronizer.sync(team, matches);
  return { team: team.id, source, fetch, matches: matches.length, sync };
}

export function buildScheduledJobs(services: CoreServices, config: AppConfig): JobDefinition[] {
  const jobs: JobDefinition[] = [
    {
      name: "load-database",
      cadence: config.scheduler.syncCadence,
      runOnStart: config.scheduler.runOnStart,
      run: async () => {
        const report = await loadDatabase(services);
        if (report.failures.length > 0) {
          const teams = report.failures.map((f) => `${f.team} (${f.reason})`).join(", ");
          throw new Error(`Fetch failed for ${teams}`);
        }
      },
    },
  ];

  const teams = config.calendar.teams;
  if (teams.length > 0) {
    jobs.push({
      name: "calendar-sync",
      cadence: config.scheduler.calendarCadence,
      runOnStart: config.scheduler.runOnStart,
      run: async () => {
        const failed: string[] = [];
        for (const team of teams) {
          try {
            const result = await addToCalendar(services, team, "store");
            if (result.sync.failed > 0) failed.push(`${result.team} (${result.sync.failed} events)`);
          } catch (error) {
            console.error(`[Jobs] calendar-sync ${team} failed: ${errorMessage(error)}`);
            failed.push(team);
          }
        }
        if (failed.length > 0) {
          throw new Error(`Calendar sync incomplete for ${failed.join(", ")}`);
        }
      },
    });
  }

  return jobs;
}
