import { FetchError } from "../../errors.js";
import type { RawFixture, Team } from "../../types/fixtures.js";
import { getJson } from "../http.js";
import { isRecord } from "./guards.js";
import { competitionHintFor, type EspnSourceOptions, type FixtureStrategy } from "./strategy.js";

// ESPN site API team schedule (JSON)
export class EndpointStrategy implements FixtureStrategy {
  readonly name = "espn-api";

  constructor(private readonly options: EspnSourceOptions) {}

  scheduleUrl(team: Team): string {
    const league = team.league ?? this.options.league;
    return `${this.options.apiBase}/${league}/teams/${encodeURIComponent(team.externalSiteId)}/schedule?fixture=true`;
  }

  async fetch(team: Team): Promise<RawFixture[]> {
    const url = this.scheduleUrl(team);
    console.log(`[Fetcher] GET ${url}`);
    const body = await getJson(url, { timeoutMs: this.options.timeoutMs });

    if (!isRecord(body) || !Array.isArray(body.events)) {
      throw new FetchError(`Unexpected schedule payload for ${team.id}: no events list`, "malformed");
    }

    const competitionHint = competitionHintFor(team, this.options);
    return body.events.map((data: unknown): RawFixture => ({ kind: "endpoint", data, competitionHint }));
  }
}
