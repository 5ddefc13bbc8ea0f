import type { AppConfig } from "../config.js";
import { createPool, runMigrations } from "../db.js";
import { createCalendarProvider } from "./calendar/googleCalendar.js";
import { CalendarSynchronizer } from "./calendar/synchronizer.js";
import { createEspnFetcher, type FixtureFetcher } from "./fixtures/fetcher.js";
import { FileCompetitionStore } from "./store/fileStore.js";
import { PostgresCompetitionStore } from "./store/postgresStore.js";
import type { CompetitionStore } from "./store/types.js";
import { loadTeamRegistry, type TeamRegistry } from "./teamRegistry.js";

// What the jobs, CLI and routes need. The calendar is created on first use
// so commands that never touch it need no credentials.
export interface CoreServices {
  registry: TeamRegistry;
  fetcher: FixtureFetcher;
  store: CompetitionStore;
  calendar(): Promise<CalendarSynchronizer>;
}

export interface Services extends CoreServices {
  config: AppConfig;
  close(): Promise<void>;
}

async function createStore(config: AppConfig): Promise<CompetitionStore> {
  if (config.store.driver === "postgres") {
    const pool = createPool(config.store.connectionString);
    await runMigrations(pool);
    console.log("[Store] Using PostgreSQL");
    return new PostgresCompetitionStore(pool);
  }
  console.log(`[Store] Using ${config.store.directory}`);
  return new FileCompetitionStore(config.store.directory);
}

export async function createServices(config: AppConfig): Promise<Services> {
  const registry = loadTeamRegistry(config.teamsFile);
  const fetcher = createEspnFetcher({ ...config.espn, timeoutMs: config.httpTimeoutMs });
  const store = await createStore(config);

  let synchronizer: Promise<CalendarSynchronizer> | undefined;
  const calendar = () => {
    if (!synchronizer) {
      synchronizer = createCalendarProvider(config.calendar, config.httpTimeoutMs).then(
        (provider) =>
          new CalendarSynchronizer(provider, {
            eventDurationMinutes: config.calendar.eventDurationMinutes,
            reminderMinutes: config.calendar.reminderMinutes,
          })
      );
      // A failed setup (e.g. a missing token file) is retried on the next call
      synchronizer.catch(() => {
        synchronizer = undefined;
      });
    }
    return synchronizer;
  };

  return {
    config,
    registry,
    fetcher,
    store,
    calendar,
    close: () => store.close(),
  };
}
