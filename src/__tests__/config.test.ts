import path from "path";
import { describe, it, expect } from "vitest";
import { loadConfig } from "../config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.httpTimeoutMs).toBe(15000);
    expect(config.espn.league).toBe("bra.1");
    expect(config.store).toEqual({ driver: "file", directory: path.resolve(process.cwd(), "db") });
    expect(config.calendar).toMatchObject({
      calendarId: "primary",
      tokenPath: "token.json",
      teams: [],
      eventDurationMinutes: 120,
      reminderMinutes: [30, 60],
    });
    expect(config.scheduler).toMatchObject({
      enabled: true,
      tick: "* * * * *",
      runOnStart: false,
      syncCadence: { kind: "weekly", weekday: 1, hour: 10, minute: 30 },
      calendarCadence: { kind: "daily", hour: 6, minute: 0 },
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      PORT: "8080",
      CORS_ORIGIN: "https://a.test, https://b.test",
      STORE_DRIVER: "postgres",
      DATABASE_URL: "postgresql://localhost/fixtures",
      CALENDAR_TEAMS: "FLAMENGO,PALMEIRAS",
      CALENDAR_REMINDERS: "10",
      SCHEDULER_ENABLED: "false",
      SYNC_CADENCE: "every 6h",
    });

    expect(config.port).toBe(8080);
    expect(config.corsOrigins).toEqual(["https://a.test", "https://b.test"]);
    expect(config.store).toEqual({ driver: "postgres", connectionString: "postgresql://localhost/fixtures" });
    expect(config.calendar.teams).toEqual(["FLAMENGO", "PALMEIRAS"]);
    expect(config.calendar.reminderMinutes).toEqual([10]);
    expect(config.scheduler.enabled).toBe(false);
    expect(config.scheduler.syncCadence).toEqual({ kind: "interval", minutes: 360 });
  });

  it("rejects invalid values at startup", () => {
    expect(() => loadConfig({ HTTP_TIMEOUT_MS: "soon" })).toThrow('HTTP_TIMEOUT_MS must be a positive integer, got "soon"');
    expect(() => loadConfig({ STORE_DRIVER: "redis" })).toThrow('Unknown STORE_DRIVER "redis"');
    expect(() => loadConfig({ STORE_DRIVER: "postgres" })).toThrow("DATABASE_URL is required");
    expect(() => loadConfig({ SCHEDULER_ENABLED: "maybe" })).toThrow("SCHEDULER_ENABLED must be true or false");
    expect(() => loadConfig({ CALENDAR_CADENCE: "sometimes" })).toThrow('Unrecognized cadence "sometimes"');
  });
});
