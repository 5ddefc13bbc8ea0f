import { FetchError, errorMessage } from "./errors.js";
import type { CoreServices } from "./services/context.js";
import { addToCalendar, loadDatabase, type CalendarRunReport, type LoadDatabaseReport } from "./services/jobs.js";

export const USAGE = `Usage: fixture-sync <command> [team]

Commands:
  load-database                 Fetch every registered team and save its competitions
  add-to-calendar <team>        Sync the team's stored matches to the calendar
  add-team-to-calendar <team>   Fetch the team live and sync it to the calendar
  list-teams                    Print the team registry
  scheduler                     Run the scheduled jobs until interrupted`;

export type Print = (line: string) => void;

function printLoadReport(report: LoadDatabaseReport, print: Print): void {
  for (const team of report.teams) {
    print(
      `${team.team}: fetched ${team.fetched}, normalized ${team.matches.length}, ` +
        `dropped ${team.dropped.length} (${team.strategy})`
    );
  }
  for (const failure of report.failures) {
    print(
      `${failure.team}: FAILED (${failure.reason}) ${failure.message}` +
        (failure.kept > 0 ? `; kept ${failure.kept} stored matches` : "")
    );
  }
  for (const competition of report.competitions) {
    print(`saved "${competition.name}": ${competition.matches} matches`);
  }
}

function printCalendarReport(report: CalendarRunReport, print: Print): void {
  if (report.fetch) {
    print(
      `${report.team}: fetched ${report.fetch.fetched}, normalized ${report.fetch.matches.length}, ` +
        `dropped ${report.fetch.dropped.length} (${report.fetch.strategy})`
    );
  } else {
    print(`${report.team}: ${report.matches} stored matches`);
  }
  const { created, updated, unchanged, failed } = report.sync;
  print(`${report.team}: created ${created}, updated ${updated}, unchanged ${unchanged}, failed ${failed}`);
  for (const error of report.sync.errors) {
    print(`  warning: ${error}`);
  }
}

// Runs one on-demand command and returns the process exit code
export async function runCommand(
  command: string | undefined,
  args: string[],
  services: CoreServices,
  print: Print = console.log
): Promise<number> {
  try {
    switch (command) {
      case "load-database": {
        const report = await loadDatabase(services);
        printLoadReport(report, print);
        // A malformed team still leaves the others' data saved
        return report.failures.some((f) => f.reason !== "malformed") ? 1 : 0;
      }

      case "add-to-calendar":
      case "add-team-to-calendar": {
        const [team] = args;
        if (!team) {
          print(`${command} needs a team\n\n${USAGE}`);
          return 2;
        }
        const source = command === "add-team-to-calendar" ? "live" : "store";
        const report = await addToCalendar(services, team, source);
        printCalendarReport(report, print);
        return 0;
      }

      case "list-teams": {
        for (const team of services.registry.list()) {
          print(`${team.id.padEnd(16)} ${team.displayName} (espn ${team.externalSiteId})`);
        }
        return 0;
      }

      default:
        print(USAGE);
        return command === undefined || command === "help" || command === "--help" ? 0 : 2;
    }
  } catch (error) {
    const reason = error instanceof FetchError ? ` (${error.reason})` : "";
    print(`${command} failed${reason}: ${errorMessage(error)}`);
    return 1;
  }
}
