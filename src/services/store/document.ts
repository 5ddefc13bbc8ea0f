import { StoreError } from "../../errors.js";
import type { Competition, Match, TeamRef } from "../../types/fixtures.js";
import { isRecord, readString } from "../fixtures/guards.js";
import { parseUtcTimestamp } from "../fixtures/timestamps.js";

// On-disk shape of one competition
export interface CompetitionDocument {
  name: string;
  updatedAt: string;
  matches: Match[];
}

function corrupt(source: string, detail: string): StoreError {
  return new StoreError(`Stored competition ${source} is corrupt: ${detail}`, "corrupt_document");
}

function parseTeamRef(value: unknown, source: string, path: string): TeamRef {
  const displayName = isRecord(value) ? readString(value.displayName) : undefined;
  if (!isRecord(value) || !displayName) {
    throw corrupt(source, `${path} has no displayName`);
  }
  const ref: TeamRef = { displayName };
  const abbreviation = readString(value.abbreviation);
  const logoUrl = readString(value.logoUrl);
  const profileLink = readString(value.profileLink);
  if (abbreviation) ref.abbreviation = abbreviation;
  if (logoUrl) ref.logoUrl = logoUrl;
  if (profileLink) ref.profileLink = profileLink;
  return ref;
}

function parseMatch(value: unknown, source: string, idx: number): Match {
  const path = `matches[${idx}]`;
  if (!isRecord(value)) throw corrupt(source, `${path} is not an object`);

  const competition = readString(value.competition);
  const kickoffTime = parseUtcTimestamp(value.kickoffTime);
  if (!competition || !kickoffTime || typeof value.completed !== "boolean") {
    throw corrupt(source, `${path} is missing competition, kickoffTime or completed`);
  }

  const match: Match = {
    competition,
    homeTeam: parseTeamRef(value.homeTeam, source, `${path}.homeTeam`),
    awayTeam: parseTeamRef(value.awayTeam, source, `${path}.awayTeam`),
    kickoffTime,
    kickoffTimeDisplay: readString(value.kickoffTimeDisplay) ?? kickoffTime,
    completed: value.completed,
  };
  const venue = readString(value.venue);
  const sourceLink = readString(value.sourceLink);
  if (venue) match.venue = venue;
  if (sourceLink) match.sourceLink = sourceLink;
  return match;
}

export function parseMatches(value: unknown, source: string): Match[] {
  if (!Array.isArray(value)) throw corrupt(source, "matches is not a list");
  return value.map((entry: unknown, idx: number) => parseMatch(entry, source, idx));
}

export function parseCompetitionDocument(raw: string, source: string): Competition {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new StoreError(`Stored competition ${source} is not valid JSON`, "corrupt_document", {
      cause: error,
    });
  }

  const name = isRecord(value) ? readString(value.name) : undefined;
  if (!isRecord(value) || !name) throw corrupt(source, "document has no name");
  return { name, matches: parseMatches(value.matches, source) };
}

export function serializeCompetition(name: string, matches: Match[], now: Date): string {
  const document: CompetitionDocument = { name, updatedAt: now.toISOString(), matches };
  return JSON.stringify(document, null, 2) + "\n";
}
