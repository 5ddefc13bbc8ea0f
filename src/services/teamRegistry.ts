import fs from "fs";
import { fileURLToPath } from "url";
import { FetchError } from "../errors.js";
import { teamNameKey, type Team } from "../types/fixtures.js";
import { isRecord, readString } from "./fixtures/guards.js";

const DEFAULT_TEAMS_FILE = fileURLToPath(new URL("../data/teams.json", import.meta.url));

export interface TeamRegistry {
  list(): readonly Team[];
  find(idOrName: string): Team | undefined;
  // Throws FetchError(not_found) for teams outside the registry
  require(idOrName: string): Team;
}

export function parseTeamEntries(raw: unknown): Team[] {
  if (!Array.isArray(raw)) {
    throw new Error("Team registry must be an array");
  }

  return raw.map((entry: unknown, idx) => {
    const id = isRecord(entry) ? readString(entry.id) : undefined;
    const displayName = isRecord(entry) ? readString(entry.displayName) : undefined;
    const siteId = isRecord(entry) ? entry.externalSiteId : undefined;
    const externalSiteId =
      typeof siteId === "number" ? String(siteId) : readString(siteId);
    const slug = isRecord(entry) ? readString(entry.slug) : undefined;
    const league = isRecord(entry) ? readString(entry.league) : undefined;

    if (!id || !displayName || !externalSiteId || !slug) {
      throw new Error(`Invalid team entry at index ${idx}`);
    }

    const team: Team = { id: id.toUpperCase(), displayName, externalSiteId, slug };
    if (league) team.league = league;
    return team;
  });
}

export function createTeamRegistry(entries: Team[]): TeamRegistry {
  const teams = Object.freeze(entries.map((team) => Object.freeze({ ...team })));
  const index = new Map<string, Team>();

  for (const team of teams) {
    const idKey = teamNameKey(team.id);
    if (index.has(idKey)) {
      throw new Error(`Duplicate team id "${team.id}" in registry`);
    }
    index.set(idKey, team);
  }
  // Names and slugs resolve too, but never shadow an id
  for (const team of teams) {
    for (const alias of [team.displayName, team.slug]) {
      const key = teamNameKey(alias);
      if (!index.has(key)) index.set(key, team);
    }
  }

  return {
    list: () => teams,
    find: (idOrName) => index.get(teamNameKey(idOrName)),
    require(idOrName) {
      const team = index.get(teamNameKey(idOrName));
      if (!team) {
        throw new FetchError(`Team "${idOrName}" is not in the registry`, "not_found");
      }
      return team;
    },
  };
}

export function loadTeamRegistry(filePath: string = DEFAULT_TEAMS_FILE): TeamRegistry {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Team registry not found at ${filePath}`);
  }
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  const registry = createTeamRegistry(parseTeamEntries(raw));
  console.log(`[Registry] Loaded ${registry.list().length} teams from ${filePath}`);
  return registry;
}
