import path from "path";
import { parseCadence, type Cadence } from "./services/scheduler.js";

export type StoreConfig =
  | { driver: "file"; directory: string }
  | { driver: "postgres"; connectionString: string };

export interface CalendarConfig {
  calendarId: string;
  serviceAccountPath?: string;
  credentialsPath?: string;
  tokenPath: string;
  teams: string[]; // teams synced by the scheduled calendar job
  eventDurationMinutes: number;
  reminderMinutes: number[];
}

export interface AppConfig {
  port: number;
  corsOrigins: string[];
  httpTimeoutMs: number;
  teamsFile?: string;
  espn: {
    apiBase: string;
    webBase: string;
    league: string;
    leagueName: string;
  };
  store: StoreConfig;
  calendar: CalendarConfig;
  scheduler: {
    enabled: boolean;
    tick: string;
    runOnStart: boolean;
    syncCadence: Cadence;
    calendarCadence: Cadence;
  };
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

function readOptional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === "true" || raw === "1" || raw === "yes") return true;
  if (raw === "false" || raw === "0" || raw === "no") return false;
  throw new Error(`${name} must be true or false, got "${raw}"`);
}

function readList(env: Env, name: string, fallback: string[] = []): string[] {
  const raw = env[name];
  if (raw === undefined) return fallback;
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

function readStore(env: Env): StoreConfig {
  const driver = readString(env, "STORE_DRIVER", "file").toLowerCase();
  if (driver === "file") {
    return {
      driver: "file",
      directory: path.resolve(readString(env, "DATABASE_DIR", path.join(process.cwd(), "db"))),
    };
  }
  if (driver === "postgres") {
    const connectionString = readOptional(env, "DATABASE_URL");
    if (!connectionString) {
      throw new Error("DATABASE_URL is required when STORE_DRIVER=postgres");
    }
    return { driver: "postgres", connectionString };
  }
  throw new Error(`Unknown STORE_DRIVER "${driver}" (expected file or postgres)`);
}

export function loadConfig(env: Env = process.env): AppConfig {
  const reminderMinutes = readList(env, "CALENDAR_REMINDERS", ["30", "60"]).map((value) => {
    const minutes = Number(value);
    if (!Number.isInteger(minutes) || minutes < 0) {
      throw new Error(`CALENDAR_REMINDERS must list whole minutes, got "${value}"`);
    }
    return minutes;
  });

  const config: AppConfig = {
    port: readInt(env, "PORT", 3000),
    corsOrigins: readList(env, "CORS_ORIGIN", ["http://localhost:5173"]),
    httpTimeoutMs: readInt(env, "HTTP_TIMEOUT_MS", 15000),
    teamsFile: readOptional(env, "TEAMS_FILE"),
    espn: {
      apiBase: readString(env, "ESPN_API_BASE", "https://site.api.espn.com/apis/site/v2/sports/soccer"),
      webBase: readString(env, "ESPN_WEB_BASE", "https://www.espn.com"),
      league: readString(env, "ESPN_LEAGUE", "bra.1"),
      leagueName: readString(env, "ESPN_LEAGUE_NAME", "Brazilian Serie A"),
    },
    store: readStore(env),
    calendar: {
      calendarId: readString(env, "GOOGLE_CALENDAR_ID", "primary"),
      serviceAccountPath: readOptional(env, "GOOGLE_CALENDAR_SERVICE_ACCOUNT_PATH"),
      credentialsPath: readOptional(env, "GOOGLE_CALENDAR_CREDENTIALS_PATH"),
      tokenPath: readString(env, "GOOGLE_CALENDAR_TOKEN_PATH", "token.json"),
      teams: readList(env, "CALENDAR_TEAMS"),
      eventDurationMinutes: readInt(env, "CALENDAR_EVENT_MINUTES", 120),
      reminderMinutes,
    },
    scheduler: {
      enabled: readBool(env, "SCHEDULER_ENABLED", true),
      tick: readString(env, "SCHEDULER_TICK", "* * * * *"),
      runOnStart: readBool(env, "SCHEDULER_RUN_ON_START", false),
      syncCadence: parseCadence(readString(env, "SYNC_CADENCE", "weekly mon 10:30")),
      calendarCadence: parseCadence(readString(env, "CALENDAR_CADENCE", "daily 06:00")),
    },
  };

  return Object.freeze(config);
}
