import { involvesTeam, sortByKickoff, type Competition, type Match, type Team } from "../../types/fixtures.js";

// Competition snapshots. `save` replaces the competition's whole match list
// and a concurrent `load` sees either the old list or the new one.
export interface CompetitionStore {
  readonly driver: "file" | "postgres";
  save(competition: string, matches: Match[]): Promise<void>;
  // undefined when nothing was ever saved under that exact name
  load(competition: string): Promise<Match[] | undefined>;
  loadAll(): Promise<Competition[]>;
  close(): Promise<void>;
}

// Matches in any stored competition that involve the team
export async function matchesForTeam(store: CompetitionStore, team: Team): Promise<Match[]> {
  const competitions = await store.loadAll();
  const matches = competitions.flatMap((competition) =>
    competition.matches.filter((match) => involvesTeam(match, team))
  );
  return sortByKickoff(matches);
}
