import { SyncError, errorMessage, toSyncError } from "../../errors.js";
import type { Match, SyncReport, Team } from "../../types/fixtures.js";
import { addMinutes } from "../fixtures/timestamps.js";
import { matchKey } from "./matchKey.js";
import type { CalendarEventInput, CalendarEventRecord, CalendarProvider } from "./provider.js";

export const SYSTEM_MARKER = "fixtureSync";

export interface SynchronizerOptions {
  eventDurationMinutes: number;
  reminderMinutes: number[];
}

export const DEFAULT_SYNC_OPTIONS: SynchronizerOptions = {
  eventDurationMinutes: 120,
  reminderMinutes: [30, 60],
};

export function eventTitle(match: Match): string {
  return `⚽ ${match.homeTeam.displayName} vs ${match.awayTeam.displayName}`;
}

function eventDescription(match: Match): string {
  const lines = [`Competition: ${match.competition}`];
  if (match.venue) lines.push(`Venue: ${match.venue}`);
  lines.push(`Kickoff: ${match.kickoffTimeDisplay}`);
  lines.push(`Status: ${match.completed ? "Completed" : "Scheduled"}`);
  if (match.sourceLink) lines.push(`Details: ${match.sourceLink}`);
  return lines.join("\n");
}

export function buildEventInput(
  match: Match,
  team: Team,
  options: SynchronizerOptions = DEFAULT_SYNC_OPTIONS
): CalendarEventInput {
  return {
    summary: eventTitle(match),
    description: eventDescription(match),
    location: match.venue,
    start: match.kickoffTime,
    end: addMinutes(match.kickoffTime, options.eventDurationMinutes),
    reminderMinutes: [...options.reminderMinutes],
    properties: {
      [SYSTEM_MARKER]: "1",
      matchKey: matchKey(match),
      teamId: team.id,
      completed: String(match.completed),
    },
  };
}

// Only the fields the sync owns are compared; user edits elsewhere survive
function needsUpdate(existing: CalendarEventRecord, wanted: CalendarEventInput): boolean {
  return (
    existing.start !== wanted.start ||
    (existing.location ?? "") !== (wanted.location ?? "") ||
    existing.properties.completed !== wanted.properties.completed
  );
}

export class CalendarSynchronizer {
  constructor(
    private readonly provider: CalendarProvider,
    private readonly options: SynchronizerOptions = DEFAULT_SYNC_OPTIONS
  ) {}

  // Creates missing events, patches changed ones and leaves the rest alone.
  // Running it twice with the same matches creates nothing the second time.
  async sync(team: Team, matches: Match[]): Promise<SyncReport> {
    const report: SyncReport = { team: team.id, created: 0, updated: 0, unchanged: 0, failed: 0, errors: [] };
    const kickoffs = matches.map((m) => m.kickoffTime).sort();
    const earliest = kickoffs[0];
    const latest = kickoffs.at(-1);
    if (!earliest || !latest) {
      console.log(`[Calendar] ${team.id}: no matches to sync`);
      return report;
    }

    let existing: CalendarEventRecord[];
    try {
      existing = await this.provider.listEvents({
        properties: { [SYSTEM_MARKER]: "1", teamId: team.id },
        timeMin: earliest,
        timeMax: addMinutes(latest, this.options.eventDurationMinutes),
      });
    } catch (error) {
      throw toSyncError("listing", error);
    }

    const byKey = new Map<string, CalendarEventRecord>();
    for (const event of existing) {
      const key = event.properties.matchKey;
      if (key && !byKey.has(key)) byKey.set(key, event);
    }

    const seen = new Set<string>();
    for (const match of matches) {
      const key = matchKey(match);
      if (seen.has(key)) continue;
      seen.add(key);

      const wanted = buildEventInput(match, team, this.options);
      const current = byKey.get(key);

      try {
        if (!current) {
          const created = await this.provider.insertEvent(wanted);
          byKey.set(key, created);
          report.created++;
        } else if (needsUpdate(current, wanted)) {
          await this.provider.patchEvent(current.id, wanted);
          report.updated++;
        } else {
          report.unchanged++;
        }
      } catch (error) {
        const failure = new SyncError(
          `${wanted.summary} (${match.kickoffTime}): ${errorMessage(error)}`,
          "per_event_failure",
          { cause: error }
        );
        console.warn(`[Calendar] ${team.id}: ${failure.message}`);
        report.failed++;
        report.errors.push(failure.message);
      }
    }

    console.log(
      `[Calendar] ${team.id}: ${report.created} created, ${report.updated} updated, ` +
        `${report.unchanged} unchanged, ${report.failed} failed`
    );
    return report;
  }
}
