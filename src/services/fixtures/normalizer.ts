import { NormalizationError } from "../../errors.js";
import type { Match, RawFixture, StrategyKind, TeamRef } from "../../types/fixtures.js";
import type { DomFixtureRow, DomTeamCell } from "./pageStrategy.js";
import { pick, readArray, readBoolean, readString } from "./guards.js";
import { formatKickoffDisplay, parseUtcTimestamp } from "./timestamps.js";

export type NormalizeResult =
  | { ok: true; match: Match }
  | { ok: false; error: NormalizationError };

export interface NormalizeOptions {
  webBase: string; // base for relative links such as /soccer/team/_/id/819
}

interface TeamFields {
  abbreviation?: string;
  displayName?: string;
  logoUrl?: string;
  profileLink?: string;
}

interface MatchFields {
  kickoff: unknown;
  display?: string;
  home?: TeamFields;
  away?: TeamFields;
  competition?: string;
  venue?: string;
  completed?: boolean;
  link?: string;
}

function resolveLink(value: unknown, webBase: string): string | undefined {
  const link = readString(value);
  if (!link) return undefined;
  try {
    return new URL(link, webBase).toString();
  } catch {
    return undefined;
  }
}

function toTeamRef(fields: TeamFields | undefined, side: string): TeamRef {
  const displayName = fields?.displayName ?? fields?.abbreviation;
  if (!displayName) {
    throw new NormalizationError(`Entry has no ${side} team`, "unmappable_entry");
  }
  const ref: TeamRef = { displayName };
  if (fields?.abbreviation) ref.abbreviation = fields.abbreviation;
  if (fields?.logoUrl) ref.logoUrl = fields.logoUrl;
  if (fields?.profileLink) ref.profileLink = fields.profileLink;
  return ref;
}

function buildMatch(fields: MatchFields, competitionHint: string | undefined): Match {
  const kickoffTime = parseUtcTimestamp(fields.kickoff);
  if (!kickoffTime) {
    const shown = typeof fields.kickoff === "string" ? `"${fields.kickoff}"` : "none";
    throw new NormalizationError(`No absolute kickoff timestamp (got ${shown})`, "missing_timestamp");
  }

  const homeTeam = toTeamRef(fields.home, "home");
  const awayTeam = toTeamRef(fields.away, "away");

  const competition = fields.competition ?? competitionHint;
  if (!competition) {
    throw new NormalizationError("Entry names no competition", "unmappable_entry");
  }

  const match: Match = {
    competition,
    homeTeam,
    awayTeam,
    kickoffTime,
    kickoffTimeDisplay: fields.display ?? formatKickoffDisplay(kickoffTime),
    completed: fields.completed ?? false,
  };
  if (fields.venue) match.venue = fields.venue;
  if (fields.link) match.sourceLink = fields.link;
  return match;
}

// Structured endpoint: events[] of the team schedule JSON
function fromEndpoint(event: unknown, webBase: string): MatchFields {
  const competition = pick(event, "competitions", 0);
  const competitors = readArray(pick(competition, "competitors"));
  const sideOf = (homeAway: string, fallbackIndex: number) =>
    competitors.find((c) => pick(c, "homeAway") === homeAway) ?? competitors[fallbackIndex];

  const team = (competitor: unknown): TeamFields | undefined => {
    if (competitor === undefined) return undefined;
    return {
      abbreviation: readString(pick(competitor, "team", "abbreviation")),
      displayName:
        readString(pick(competitor, "team", "displayName")) ??
        readString(pick(competitor, "team", "name")),
      logoUrl:
        readString(pick(competitor, "team", "logos", 0, "href")) ??
        readString(pick(competitor, "team", "logo")),
      profileLink: resolveLink(pick(competitor, "team", "links", 0, "href"), webBase),
    };
  };

  const status = pick(competition, "status", "type") ?? pick(event, "status", "type");

  return {
    kickoff: pick(event, "date"),
    display: readString(pick(status, "shortDetail")),
    home: team(sideOf("home", 0)),
    away: team(sideOf("away", 1)),
    competition: readString(pick(event, "league", "name")),
    venue: readString(pick(competition, "venue", "fullName")),
    completed: readBoolean(pick(status, "completed")) ?? (pick(status, "state") === "post" ? true : undefined),
    link: resolveLink(pick(event, "links", 0, "href"), webBase),
  };
}

// Page payload: page.content.fixtures.events[]
function fromEmbedded(event: unknown, webBase: string): MatchFields {
  const competitors = readArray(pick(event, "competitors"));
  const team = (competitor: unknown): TeamFields | undefined => {
    if (competitor === undefined) return undefined;
    return {
      abbreviation: readString(pick(competitor, "abbrev")),
      displayName: readString(pick(competitor, "displayName")),
      logoUrl: readString(pick(competitor, "logo")),
      profileLink: resolveLink(pick(competitor, "links"), webBase),
    };
  };

  return {
    kickoff: pick(event, "date"),
    display: readString(pick(event, "status", "detail")),
    home: team(competitors.find((c) => pick(c, "isHome") === true)),
    away: team(competitors.find((c) => pick(c, "isHome") !== true)),
    competition: readString(pick(event, "league")),
    venue: readString(pick(event, "venue", "fullName")),
    completed:
      readBoolean(pick(event, "completed")) ??
      (pick(event, "status", "state") === "post" ? true : undefined),
    link: resolveLink(pick(event, "link"), webBase),
  };
}

function fromDomCell(cell: DomTeamCell, webBase: string): TeamFields {
  return {
    abbreviation: cell.abbreviation,
    displayName: cell.name,
    logoUrl: cell.logo,
    profileLink: resolveLink(cell.link, webBase),
  };
}

function isDomRow(data: unknown): data is DomFixtureRow {
  return (
    typeof data === "object" &&
    data !== null &&
    "home" in data &&
    "away" in data &&
    typeof data.home === "object" &&
    data.home !== null &&
    typeof data.away === "object" &&
    data.away !== null
  );
}

// Table row: the visible date/time cells are display only
function fromDom(data: unknown, webBase: string): MatchFields {
  if (!isDomRow(data)) {
    throw new NormalizationError("Table row has no team cells", "unmappable_entry");
  }
  const display = [data.date, data.time].filter(Boolean).join(" ");
  return {
    kickoff: data.datetime,
    display: display || undefined,
    home: fromDomCell(data.home, webBase),
    away: fromDomCell(data.away, webBase),
    competition: data.competition,
    venue: data.venue,
    completed: data.time?.toUpperCase() === "FT" ? true : undefined,
    link: resolveLink(data.link, webBase),
  };
}

const READERS: Record<StrategyKind, (data: unknown, webBase: string) => MatchFields> = {
  endpoint: fromEndpoint,
  embedded: fromEmbedded,
  dom: fromDom,
};

export function normalize(raw: RawFixture, options: NormalizeOptions): NormalizeResult {
  try {
    const fields = READERS[raw.kind](raw.data, options.webBase);
    return { ok: true, match: buildMatch(fields, raw.competitionHint) };
  } catch (error) {
    if (error instanceof NormalizationError) {
      return { ok: false, error };
    }
    throw error;
  }
}
