import { describe, it, expect } from "vitest";
import {
  describeCadence,
  nextOccurrence,
  parseCadence,
  Scheduler,
  type JobDefinition,
} from "../services/scheduler.js";

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = () => r();
  });
  return { promise, resolve };
}

describe("parseCadence", () => {
  it("parses intervals in minutes and hours", () => {
    expect(parseCadence("every 360m")).toEqual({ kind: "interval", minutes: 360 });
    expect(parseCadence("every 6h")).toEqual({ kind: "interval", minutes: 360 });
  });

  it("parses daily and weekly times", () => {
    expect(parseCadence("daily 06:00")).toEqual({ kind: "daily", hour: 6, minute: 0 });
    expect(parseCadence("Weekly Monday 10:30")).toEqual({ kind: "weekly", weekday: 1, hour: 10, minute: 30 });
  });

  it("rejects malformed cadences", () => {
    expect(() => parseCadence("every 0m")).toThrow("Invalid interval");
    expect(() => parseCadence("daily 25:00")).toThrow('Invalid time "25:00"');
    expect(() => parseCadence("weekly funday 10:00")).toThrow('Invalid weekday "funday"');
    expect(() => parseCadence("hourly")).toThrow('Unrecognized cadence "hourly"');
  });

  it("describes cadences in the same text form", () => {
    expect(describeCadence(parseCadence("weekly mon 10:30"))).toBe("weekly mon 10:30");
    expect(describeCadence(parseCadence("daily 6:05"))).toBe("daily 06:05");
    expect(describeCadence(parseCadence("every 2h"))).toBe("every 120m");
  });
});

describe("nextOccurrence", () => {
  it("adds the interval", () => {
    const next = nextOccurrence({ kind: "interval", minutes: 360 }, new Date("2025-03-01T12:00:00Z"));
    expect(next.toISOString()).toBe("2025-03-01T18:00:00.000Z");
  });

  it("returns today's slot when it is still ahead, otherwise tomorrow's", () => {
    const daily = parseCadence("daily 06:00");
    expect(nextOccurrence(daily, new Date("2025-03-01T05:00:00Z")).toISOString()).toBe("2025-03-01T06:00:00.000Z");
    expect(nextOccurrence(daily, new Date("2025-03-01T06:00:00Z")).toISOString()).toBe("2025-03-02T06:00:00.000Z");
  });

  it("finds the next weekday", () => {
    const weekly = parseCadence("weekly mon 10:30");
    // 2025-03-01 is a Saturday
    expect(nextOccurrence(weekly, new Date("2025-03-01T12:00:00Z")).toISOString()).toBe("2025-03-03T10:30:00.000Z");
    expect(nextOccurrence(weekly, new Date("2025-03-03T10:30:00Z")).toISOString()).toBe("2025-03-10T10:30:00.000Z");
    expect(nextOccurrence(weekly, new Date("2025-03-03T09:00:00Z")).toISOString()).toBe("2025-03-03T10:30:00.000Z");
  });
});

describe("Scheduler", () => {
  const start = new Date("2025-03-01T00:00:00Z");

  function clock(initial: Date) {
    let current = initial;
    return {
      now: () => current,
      set: (value: string) => {
        current = new Date(value);
      },
    };
  }

  it("creates jobs idle with their first occurrence as next run", () => {
    const scheduler = new Scheduler(
      [{ name: "sync", cadence: parseCadence("daily 06:00"), run: async () => {} }],
      { now: () => start }
    );

    expect(scheduler.jobs()).toEqual([
      {
        name: "sync",
        cadence: "daily 06:00",
        state: "idle",
        lastRun: undefined,
        lastFinished: undefined,
        lastError: undefined,
        nextRun: "2025-03-01T06:00:00.000Z",
      },
    ]);
  });

  it("runs only due jobs and reschedules them", async () => {
    const time = clock(start);
    let runs = 0;
    const scheduler = new Scheduler(
      [{ name: "sync", cadence: parseCadence("daily 06:00"), run: async () => void runs++ }],
      { now: time.now }
    );

    await scheduler.tick(new Date("2025-03-01T05:59:00Z"));
    expect(runs).toBe(0);

    time.set("2025-03-01T06:00:30Z");
    await scheduler.tick();
    expect(runs).toBe(1);

    const [job] = scheduler.jobs();
    expect(job?.state).toBe("idle");
    expect(job?.lastRun).toBe("2025-03-01T06:00:30.000Z");
    expect(job?.nextRun).toBe("2025-03-02T06:00:00.000Z");
  });

  it("runs runOnStart jobs on the first tick", async () => {
    let runs = 0;
    const scheduler = new Scheduler(
      [{ name: "load", cadence: parseCadence("weekly mon 10:30"), runOnStart: true, run: async () => void runs++ }],
      { now: () => start }
    );

    await scheduler.tick();

    expect(runs).toBe(1);
    expect(scheduler.jobs()[0]?.nextRun).toBe("2025-03-03T10:30:00.000Z");
  });

  it("never starts a second run while one is in flight", async () => {
    const gate = deferred();
    let runs = 0;
    const job: JobDefinition = {
      name: "slow",
      cadence: parseCadence("every 1m"),
      runOnStart: true,
      run: async () => {
        runs++;
        await gate.promise;
      },
    };
    const time = clock(start);
    const scheduler = new Scheduler([job], { now: time.now });

    const firstTick = scheduler.tick();
    expect(scheduler.isTicking).toBe(true);
    expect(scheduler.jobs()[0]?.state).toBe("running");

    // Several intervals later the job is overdue but still running
    time.set("2025-03-01T00:05:00Z");
    await scheduler.tick();
    await scheduler.tick();

    expect(runs).toBe(1);
    expect(scheduler.jobs()[0]?.state).toBe("running");

    gate.resolve();
    await firstTick;

    expect(scheduler.jobs()[0]?.state).toBe("idle");
    expect(scheduler.isTicking).toBe(false);
  });

  it("records a failure and keeps the loop going", async () => {
    const time = clock(start);
    let attempt = 0;
    const scheduler = new Scheduler(
      [
        {
          name: "flaky",
          cadence: parseCadence("every 10m"),
          runOnStart: true,
          run: async () => {
            attempt++;
            if (attempt === 1) throw new Error("ESPN unavailable");
          },
        },
      ],
      { now: time.now }
    );

    await expect(scheduler.tick()).resolves.toBeUndefined();
    expect(scheduler.jobs()[0]).toMatchObject({
      state: "failed",
      lastError: "ESPN unavailable",
      nextRun: "2025-03-01T00:10:00.000Z",
    });

    time.set("2025-03-01T00:10:00Z");
    await scheduler.tick();

    expect(attempt).toBe(2);
    expect(scheduler.jobs()[0]).toMatchObject({ state: "idle", lastError: undefined });
  });

  it("keeps interval jobs on the tick that made them due", async () => {
    const time = clock(new Date("2025-03-01T09:30:00Z"));
    let runs = 0;
    const scheduler = new Scheduler(
      [{ name: "poll", cadence: parseCadence("every 30m"), run: async () => void runs++ }],
      { now: time.now }
    );

    // The job reads the clock a little after the cron tick fired
    time.set("2025-03-01T10:00:00.020Z");
    await scheduler.tick(new Date("2025-03-01T10:00:00.005Z"));
    expect(scheduler.jobs()[0]?.nextRun).toBe("2025-03-01T10:30:00.000Z");

    time.set("2025-03-01T10:30:00.020Z");
    await scheduler.tick(new Date("2025-03-01T10:30:00.004Z"));

    expect(runs).toBe(2);
    expect(scheduler.jobs()[0]?.nextRun).toBe("2025-03-01T11:00:00.000Z");
  });

  it("runs due jobs one after another in table order", async () => {
    const order: string[] = [];
    const job = (name: string): JobDefinition => ({
      name,
      cadence: parseCadence("every 5m"),
      runOnStart: true,
      run: async () => {
        order.push(`${name}:start`);
        await new Promise((resolve) => setTimeout(resolve, 5));
        order.push(`${name}:end`);
      },
    });
    const scheduler = new Scheduler([job("a"), job("b")], { now: () => start });

    await scheduler.tick();

    expect(order).toEqual(["a:start", "a:end", "b:start", "b:end"]);
  });

  it("stop waits for the running job to finish", async () => {
    const gate = deferred();
    let finished = false;
    const scheduler = new Scheduler(
      [
        {
          name: "slow",
          cadence: parseCadence("every 1m"),
          runOnStart: true,
          run: async () => {
            await gate.promise;
            finished = true;
          },
        },
      ],
      { now: () => start }
    );

    const tick = scheduler.tick();
    const stopped = scheduler.stop();
    gate.resolve();
    await stopped;

    expect(finished).toBe(true);
    await tick;
  });

  it("rejects duplicate job names", () => {
    const job: JobDefinition = { name: "sync", cadence: parseCadence("every 5m"), run: async () => {} };
    expect(() => new Scheduler([job, job])).toThrow('Duplicate job name "sync"');
  });

  it("refuses to start with an invalid tick expression", () => {
    const scheduler = new Scheduler([], { tick: "not a cron" });
    expect(() => scheduler.start()).toThrow('Invalid scheduler tick expression "not a cron"');
  });
});
