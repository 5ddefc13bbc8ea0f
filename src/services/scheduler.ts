import cron, { type ScheduledTask } from "node-cron";
import { errorMessage } from "../errors.js";

// Cadences are evaluated in UTC
export type Cadence =
  | { kind: "interval"; minutes: number }
  | { kind: "daily"; hour: number; minute: number }
  | { kind: "weekly"; weekday: number; hour: number; minute: number }; // weekday: 0 = Sunday

export type JobState = "idle" | "running" | "failed";

export interface JobDefinition {
  name: string;
  cadence: Cadence;
  run: () => Promise<void>;
  runOnStart?: boolean;
}

// Serializable view of a job (for the API and logs)
export interface ScheduledJob {
  name: string;
  cadence: string;
  state: JobState;
  lastRun?: string;
  lastFinished?: string;
  lastError?: string;
  nextRun: string;
}

interface JobEntry {
  definition: JobDefinition;
  state: JobState;
  lastRun?: Date;
  lastFinished?: Date;
  lastError?: string;
  nextRun: Date;
}

export interface SchedulerOptions {
  tick?: string; // node-cron expression driving the tick loop
  now?: () => Date;
}

const WEEKDAYS = ["sun", "mon", "tue", "wed", "thu", "fri", "sat"];
const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

function parseClock(value: string, text: string): { hour: number; minute: number } {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value);
  const hour = Number(match?.[1]);
  const minute = Number(match?.[2]);
  if (!match || hour > 23 || minute > 59) {
    throw new Error(`Invalid time "${value}" in cadence "${text}"`);
  }
  return { hour, minute };
}

// Accepts "every 30m", "every 6h", "daily 06:00", "weekly mon 10:30"
export function parseCadence(text: string): Cadence {
  const parts = text.trim().toLowerCase().split(/\s+/);
  const [kind, first, second] = parts;

  if (kind === "every" && first && parts.length === 2) {
    const match = /^(\d+)(m|h)$/.exec(first);
    const amount = Number(match?.[1]);
    if (!match || amount <= 0) {
      throw new Error(`Invalid interval in cadence "${text}"`);
    }
    return { kind: "interval", minutes: match[2] === "h" ? amount * 60 : amount };
  }

  if (kind === "daily" && first && parts.length === 2) {
    return { kind: "daily", ...parseClock(first, text) };
  }

  if (kind === "weekly" && first && second && parts.length === 3) {
    const weekday = WEEKDAYS.indexOf(first.slice(0, 3));
    if (weekday === -1) {
      throw new Error(`Invalid weekday "${first}" in cadence "${text}"`);
    }
    return { kind: "weekly", weekday, ...parseClock(second, text) };
  }

  throw new Error(`Unrecognized cadence "${text}"`);
}

export function describeCadence(cadence: Cadence): string {
  const clock = (hour: number, minute: number) =>
    `${String(hour).padStart(2, "0")}:${String(minute).padStart(2, "0")}`;
  switch (cadence.kind) {
    case "interval":
      return `every ${cadence.minutes}m`;
    case "daily":
      return `daily ${clock(cadence.hour, cadence.minute)}`;
    case "weekly":
      return `weekly ${WEEKDAYS[cadence.weekday]} ${clock(cadence.hour, cadence.minute)}`;
  }
}

// Ticks come once a minute, so due times are kept on minute boundaries
function startOfMinute(date: Date): Date {
  return new Date(Math.floor(date.getTime() / MINUTE_MS) * MINUTE_MS);
}

// First occurrence strictly after `after`
export function nextOccurrence(cadence: Cadence, after: Date): Date {
  if (cadence.kind === "interval") {
    return new Date(after.getTime() + cadence.minutes * MINUTE_MS);
  }

  const candidate = new Date(
    Date.UTC(
      after.getUTCFullYear(),
      after.getUTCMonth(),
      after.getUTCDate(),
      cadence.hour,
      cadence.minute
    )
  );

  if (cadence.kind === "daily") {
    return candidate > after ? candidate : new Date(candidate.getTime() + DAY_MS);
  }

  const daysAhead = (cadence.weekday - after.getUTCDay() + 7) % 7;
  const weekly = new Date(candidate.getTime() + daysAhead * DAY_MS);
  return weekly > after ? weekly : new Date(weekly.getTime() + 7 * DAY_MS);
}

export class Scheduler {
  private readonly entries: JobEntry[];
  private readonly now: () => Date;
  private readonly tickExpression: string;
  private task?: ScheduledTask;
  private inFlight?: Promise<void>;
  private stopping = false;

  constructor(definitions: JobDefinition[], options: SchedulerOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.tickExpression = options.tick ?? "* * * * *";

    const names = new Set<string>();
    const createdAt = this.now();
    this.entries = definitions.map((definition): JobEntry => {
      if (names.has(definition.name)) {
        throw new Error(`Duplicate job name "${definition.name}"`);
      }
      names.add(definition.name);
      return {
        definition,
        state: "idle",
        nextRun: definition.runOnStart
          ? createdAt
          : nextOccurrence(definition.cadence, startOfMinute(createdAt)),
      };
    });
  }

  jobs(): ScheduledJob[] {
    return this.entries.map((entry) => ({
      name: entry.definition.name,
      cadence: describeCadence(entry.definition.cadence),
      state: entry.state,
      lastRun: entry.lastRun?.toISOString(),
      lastFinished: entry.lastFinished?.toISOString(),
      lastError: entry.lastError,
      nextRun: entry.nextRun.toISOString(),
    }));
  }

  get isTicking(): boolean {
    return this.inFlight !== undefined;
  }

  // Runs every due job, one after another. A tick that arrives while the
  // previous one is still running is skipped.
  async tick(now: Date = this.now()): Promise<void> {
    if (this.inFlight) {
      console.warn("[Scheduler] Previous tick still running, skipping");
      return;
    }

    const run = this.runDueJobs(now);
    this.inFlight = run;
    try {
      await run;
    } finally {
      this.inFlight = undefined;
    }
  }

  start(): void {
    if (this.task) return;
    if (!cron.validate(this.tickExpression)) {
      throw new Error(`Invalid scheduler tick expression "${this.tickExpression}"`);
    }

    this.stopping = false;
    this.task = cron.schedule(this.tickExpression, () => {
      this.tick().catch((error) => {
        console.error("[Scheduler] Tick failed:", error);
      });
    });

    const summary = this.jobs()
      .map((job) => `${job.name} (${job.cadence}, next ${job.nextRun})`)
      .join(", ");
    console.log(`[Scheduler] Started: ${summary || "no jobs"}`);

    // First tick right away so runOnStart jobs do not wait for the cron
    this.tick().catch((error) => {
      console.error("[Scheduler] Initial tick failed:", error);
    });
  }

  // Stops the timer, then waits for the job in flight to finish
  async stop(): Promise<void> {
    this.stopping = true;
    this.task?.stop();
    this.task = undefined;
    if (this.inFlight) {
      console.log("[Scheduler] Waiting for running job to finish...");
      await this.inFlight;
    }
    console.log("[Scheduler] Stopped");
  }

  private async runDueJobs(now: Date): Promise<void> {
    for (const entry of this.entries) {
      if (this.stopping) break;
      if (entry.nextRun <= now) {
        await this.runJob(entry, now);
      }
    }
  }

  // The next run counts from the tick, not from when the job got going, so
  // an interval job stays on the tick that made it due
  private async runJob(entry: JobEntry, tickedAt: Date): Promise<void> {
    const { name, cadence } = entry.definition;

    entry.state = "running";
    entry.lastRun = this.now();
    entry.nextRun = nextOccurrence(cadence, startOfMinute(tickedAt));
    console.log(`[Scheduler] Running ${name}...`);

    try {
      await entry.definition.run();
      entry.state = "idle";
      entry.lastError = undefined;
      console.log(`[Scheduler] ${name} completed, next run ${entry.nextRun.toISOString()}`);
    } catch (error) {
      entry.state = "failed";
      entry.lastError = errorMessage(error);
      console.error(`[Scheduler] ${name} failed:`, error);
    } finally {
      entry.lastFinished = this.now();
    }
  }
}
