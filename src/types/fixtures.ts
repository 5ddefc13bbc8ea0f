// Registered team (loaded from the team registry)
export interface Team {
  id: string; // e.g. "FLAMENGO"
  displayName: string;
  externalSiteId: string; // ESPN team id
  slug: string; // ESPN url slug
  league?: string; // ESPN league slug, falls back to ESPN_LEAGUE
}

// One side of a match as the source describes it
export interface TeamRef {
  abbreviation?: string; // 3-letter code when the source has one
  displayName: string;
  logoUrl?: string;
  profileLink?: string;
}

// Canonical match record
export interface Match {
  competition: string;
  homeTeam: TeamRef;
  awayTeam: TeamRef;
  kickoffTime: string; // ISO datetime in UTC, second precision
  kickoffTimeDisplay: string;
  completed: boolean;
  venue?: string;
  sourceLink?: string;
}

export interface Competition {
  name: string;
  matches: Match[];
}

export type StrategyKind = "endpoint" | "embedded" | "dom";

// Raw entry produced by a fixture strategy, before normalization.
// `competitionHint` is used when the entry itself names no competition.
export interface RawFixture {
  kind: StrategyKind;
  data: unknown;
  competitionHint?: string;
}

export interface DroppedEntry {
  reason: string;
  message: string;
}

// Result of one fetch for one team
export interface FetchReport {
  team: string;
  strategy: string;
  fetched: number;
  matches: Match[];
  dropped: DroppedEntry[];
}

export interface SyncReport {
  team: string;
  created: number;
  updated: number;
  unchanged: number;
  failed: number;
  errors: string[];
}

// Identity of a match for reconciliation.
// Missing abbreviations fall back to the upper-cased display name.
export function matchIdentity(match: Match): [string, string, string] {
  return [
    teamIdentity(match.homeTeam),
    teamIdentity(match.awayTeam),
    match.kickoffTime,
  ];
}

export function teamIdentity(team: TeamRef): string {
  return (team.abbreviation || team.displayName).trim().toUpperCase();
}

// Sort by kickoff (ISO strings in UTC sort lexically)
export function sortByKickoff(matches: Match[]): Match[] {
  return [...matches].sort((a, b) => a.kickoffTime.localeCompare(b.kickoffTime));
}

// Group matches into competitions, dropping duplicates by identity
export function groupByCompetition(matches: Match[]): Competition[] {
  const byCompetition = new Map<string, Map<string, Match>>();
  for (const match of matches) {
    let bucket = byCompetition.get(match.competition);
    if (!bucket) {
      bucket = new Map();
      byCompetition.set(match.competition, bucket);
    }
    const key = matchIdentity(match).join("|");
    if (!bucket.has(key)) {
      bucket.set(key, match);
    }
  }

  return [...byCompetition.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, bucket]) => ({
      name,
      matches: sortByKickoff([...bucket.values()]),
    }));
}

// "São Paulo", "sao_paulo" and "SAO-PAULO" share the key "sao-paulo"
export function teamNameKey(value: string): string {
  return value
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .trim()
    .toLowerCase()
    .replace(/[\s_-]+/g, "-");
}

// Whether a stored match involves the given team. Names must match whole:
// "Sport" is not "Sporting Cristal".
export function involvesTeam(match: Match, team: Team): boolean {
  const keys = new Set([team.id, team.displayName, team.slug].map(teamNameKey));
  return [match.homeTeam, match.awayTeam].some(
    (side) =>
      keys.has(teamNameKey(side.displayName)) ||
      (side.abbreviation !== undefined && keys.has(teamNameKey(side.abbreviation)))
  );
}
