import type { RawFixture, Team } from "../../types/fixtures.js";

// One way of obtaining raw fixture entries for a team. Throwing means the
// source failed; resolving (even with an empty list) makes the result
// authoritative.
export interface FixtureStrategy {
  readonly name: string;
  fetch(team: Team): Promise<RawFixture[]>;
}

export interface EspnSourceOptions {
  apiBase: string; // e.g. https://site.api.espn.com/apis/site/v2/sports/soccer
  webBase: string; // e.g. https://www.espn.com
  league: string; // default league slug, e.g. bra.1
  leagueName: string; // competition name used when an entry names none
  timeoutMs: number;
}

// The configured league name only applies to teams playing in that league
export function competitionHintFor(team: Team, options: EspnSourceOptions): string | undefined {
  return !team.league || team.league === options.league ? options.leagueName : undefined;
}
